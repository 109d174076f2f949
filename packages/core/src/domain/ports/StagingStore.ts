import type { StagingArea, StagingAreaSummary } from '../model/StagingArea.js';

/**
 * Port for the per-shard staging areas.
 *
 * `writeArea()` must be all-or-nothing: after it resolves the area holds
 * exactly `area.rows`; after it rejects the previous content (if any) is intact.
 */
export interface StagingStore {
  /** Atomically replace the staging area of `(batchId, shardId)`. */
  writeArea(area: StagingArea): Promise<void>;
  listAreas(batchId: string): Promise<readonly StagingArea[]>;
  /** @returns Number of areas deleted. */
  deleteAreas(batchId: string, shardIds: readonly string[]): Promise<number>;
  listSummaries(): Promise<readonly StagingAreaSummary[]>;
}
