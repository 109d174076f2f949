import type { PredictionResult } from './PredictionResult.js';

/**
 * Per-shard holding area isolating uncommitted results from the shared store.
 * Written as a whole by exactly one worker invocation.
 */
export interface StagingArea {
  readonly batchId: string;
  readonly shardId: string;
  readonly writtenAt: number;
  readonly rows: readonly PredictionResult[];
}

/** Staging metadata without the rows, for housekeeping. */
export interface StagingAreaSummary {
  readonly batchId: string;
  readonly shardId: string;
  readonly writtenAt: number;
  readonly rowCount: number;
}
