import type { PredictionResult, Recommendation } from '../model/PredictionResult.js';
import { Recommendation as Rec, toBusinessKey } from '../model/PredictionResult.js';
import type { GradeRecord } from '../model/GradeRecord.js';

export const DEFAULT_TOLERANCE_BANDS: readonly number[] = [3, 5];

/** Rounding keeps float noise (e.g. `27.5 - 30.1`) out of stored metrics. */
function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Whether a recommendation was right against the line.
 *
 * `null` for a push (actual equals the line), for PASS/HOLD, and without a line.
 */
export function computeCorrect(
  recommendation: Recommendation,
  quotedLine: number | null,
  actualValue: number,
): boolean | null {
  if (quotedLine === null) return null;
  if (recommendation !== Rec.OVER && recommendation !== Rec.UNDER) return null;
  if (actualValue === quotedLine) return null;
  return recommendation === Rec.OVER ? actualValue > quotedLine : actualValue < quotedLine;
}

/** Confidence bucket 1–10; values at or above 1 land in 10. */
export function confidenceDecile(confidence: number): number | null {
  if (!Number.isFinite(confidence)) return null;
  const decile = Math.floor(confidence * 10) + 1;
  return Math.min(10, Math.max(1, decile));
}

export interface GradeContext {
  readonly gradingRunId: string;
  readonly gradedAt: number;
  readonly toleranceBands?: readonly number[];
}

/** Score one result against its verified actual value. */
export function gradeResult(result: PredictionResult, actualValue: number, ctx: GradeContext): GradeRecord {
  const signedError = round(result.value - actualValue);
  const absoluteError = Math.abs(signedError);
  const bands = ctx.toleranceBands ?? DEFAULT_TOLERANCE_BANDS;

  return {
    ...toBusinessKey(result),
    gradingRunId: ctx.gradingRunId,
    targetDate: result.targetDate,
    recommendation: result.recommendation,
    predictedValue: result.value,
    actualValue,
    absoluteError,
    signedError,
    withinTolerance: bands.map((band) => ({ band, within: absoluteError <= band })),
    predictedMargin: result.quotedLine === null ? null : round(result.value - result.quotedLine),
    actualMargin: result.quotedLine === null ? null : round(actualValue - result.quotedLine),
    correct: computeCorrect(result.recommendation, result.quotedLine, actualValue),
    confidenceDecile: confidenceDecile(result.confidence),
    gradedAt: ctx.gradedAt,
  };
}
