import type { BusinessKey, Recommendation } from './PredictionResult.js';

/** Error of a prediction against one tolerance band. */
export interface ToleranceCheck {
  readonly band: number;
  readonly within: boolean;
}

/**
 * Post-hoc score of one prediction. Stored under the business key alone, so
 * grading the same result again overwrites instead of adding a row.
 */
export interface GradeRecord extends BusinessKey {
  readonly gradingRunId: string;
  readonly targetDate: string;
  readonly recommendation: Recommendation;
  readonly predictedValue: number;
  readonly actualValue: number;
  readonly absoluteError: number;
  readonly signedError: number;
  readonly withinTolerance: readonly ToleranceCheck[];
  /** `predictedValue - quotedLine`; `null` without a line. */
  readonly predictedMargin: number | null;
  /** `actualValue - quotedLine`; `null` without a line. */
  readonly actualMargin: number | null;
  /** `null` for a push, for PASS/HOLD, or without a line. */
  readonly correct: boolean | null;
  /** 1–10; `null` when the confidence is not a number. */
  readonly confidenceDecile: number | null;
  readonly gradedAt: number;
}
