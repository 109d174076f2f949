import type { PredictionResult } from '../model/PredictionResult.js';
import { isRecommendation } from '../model/PredictionResult.js';
import type { GateDecision } from '../model/GateDecision.js';
import { accepted, rejected } from '../model/GateDecision.js';

/** Known placeholder written by upstream feeds when no real value exists. */
export const DEFAULT_SENTINEL_VALUE = 20;

/** Line sources whose quotes are real market lines. */
export const DEFAULT_ACCEPTED_LINE_SOURCES: readonly string[] = ['ACTUAL_PROP', 'ODDS_API', 'BETTINGPROS'];

export interface ValidationGateOptions {
  readonly sentinelValue?: number;
  readonly acceptedLineSources?: readonly string[];
}

/**
 * Pure filter that rejects malformed or placeholder results.
 *
 * Fail-closed: anything it rejects is omitted from the batch output, never
 * written with a known-wrong value.
 */
export class ValidationGate {
  private readonly sentinelValue: number;
  private readonly acceptedLineSources: ReadonlySet<string>;

  constructor(options: ValidationGateOptions = {}) {
    this.sentinelValue = options.sentinelValue ?? DEFAULT_SENTINEL_VALUE;
    this.acceptedLineSources = new Set(options.acceptedLineSources ?? DEFAULT_ACCEPTED_LINE_SOURCES);
  }

  validate(result: PredictionResult): GateDecision {
    for (const field of ['entityId', 'eventId', 'strategyId', 'batchId', 'targetDate'] as const) {
      const value = result[field];
      if (typeof value !== 'string' || value.trim() === '') {
        return rejected('MISSING_IDENTIFIER', `Missing identifier: ${field}`);
      }
    }

    if (!Number.isFinite(result.value)) {
      return rejected('NON_FINITE_VALUE', `Value is not a finite number: ${String(result.value)}`);
    }
    if (result.value === this.sentinelValue) {
      return rejected('SENTINEL_VALUE', `Value equals the placeholder ${String(this.sentinelValue)}`);
    }
    if (result.quotedLine !== null && result.quotedLine === this.sentinelValue) {
      return rejected('SENTINEL_LINE', `Quoted line equals the placeholder ${String(this.sentinelValue)}`);
    }
    if (!Number.isFinite(result.confidence) || result.confidence < 0 || result.confidence > 1) {
      return rejected('CONFIDENCE_OUT_OF_RANGE', `Confidence ${String(result.confidence)} is outside [0, 1]`);
    }
    if (!isRecommendation(result.recommendation)) {
      return rejected('UNKNOWN_RECOMMENDATION', `Unknown recommendation: ${String(result.recommendation)}`);
    }
    if (result.lineSource === null || !this.acceptedLineSources.has(result.lineSource)) {
      return rejected('UNACCEPTED_LINE_SOURCE', `Line source ${String(result.lineSource)} is not accepted`);
    }

    return accepted();
  }
}
