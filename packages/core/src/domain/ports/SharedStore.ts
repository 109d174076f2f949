import type { BusinessKey, PredictionResult } from '../model/PredictionResult.js';
import type { GradeRecord } from '../model/GradeRecord.js';

export interface ResultQuery {
  readonly targetDate: string;
  readonly strategyIds?: readonly string[];
  readonly includeVoided?: boolean;
}

/**
 * Port for the shared columnar store holding finalized results and grades.
 *
 * Both upserts are keyed by the business key: a row is inserted if absent and
 * overwritten if present, atomically for the whole call.
 */
export interface SharedStore {
  /** @returns Number of rows written. */
  upsertResults(rows: readonly PredictionResult[]): Promise<number>;
  /** Count how many of `keys` exist in the results table. */
  countResultKeys(keys: readonly BusinessKey[]): Promise<number>;
  findResults(query: ResultQuery): Promise<readonly PredictionResult[]>;
  /** @returns Number of results newly marked voided. */
  markVoided(keys: readonly BusinessKey[], reason: string): Promise<number>;
  upsertGrades(grades: readonly GradeRecord[]): Promise<number>;
  countGradeKeys(keys: readonly BusinessKey[]): Promise<number>;
  /** Serialized business keys (see `businessKeyOf`) of every graded result on the date. */
  findGradedKeys(targetDate: string): Promise<ReadonlySet<string>>;
  findGrades(targetDate: string): Promise<readonly GradeRecord[]>;
}
