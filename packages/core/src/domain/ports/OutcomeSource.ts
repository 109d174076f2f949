import type { EntityEventRef, OutcomeFetchResult } from '../model/Outcome.js';

/** Supplies realized outcomes for grading. */
export interface OutcomeSource {
  fetchOutcomes(targetDate: string, refs: readonly EntityEventRef[]): Promise<OutcomeFetchResult>;
  /** Ask the source to backfill missing outcomes for the date. Optional. */
  requestBackfill?(targetDate: string): Promise<void>;
}
