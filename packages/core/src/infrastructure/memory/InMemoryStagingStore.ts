import type { StagingStore } from '../../domain/ports/StagingStore.js';
import type { StagingArea, StagingAreaSummary } from '../../domain/model/StagingArea.js';

const areaKey = (batchId: string, shardId: string): string => `${batchId}/${shardId}`;

/** Non-persistent staging store. A write replaces the whole area in one step. */
export class InMemoryStagingStore implements StagingStore {
  private readonly areas = new Map<string, StagingArea>();

  writeArea(area: StagingArea): Promise<void> {
    this.areas.set(areaKey(area.batchId, area.shardId), { ...area, rows: [...area.rows] });
    return Promise.resolve();
  }

  listAreas(batchId: string): Promise<readonly StagingArea[]> {
    return Promise.resolve([...this.areas.values()].filter((a) => a.batchId === batchId));
  }

  deleteAreas(batchId: string, shardIds: readonly string[]): Promise<number> {
    let deleted = 0;
    for (const shardId of shardIds) {
      if (this.areas.delete(areaKey(batchId, shardId))) deleted++;
    }
    return Promise.resolve(deleted);
  }

  listSummaries(): Promise<readonly StagingAreaSummary[]> {
    return Promise.resolve(
      [...this.areas.values()].map((a) => ({
        batchId: a.batchId,
        shardId: a.shardId,
        writtenAt: a.writtenAt,
        rowCount: a.rows.length,
      })),
    );
  }
}
