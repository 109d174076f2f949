import type { IdempotencyStore } from '../../domain/ports/IdempotencyStore.js';
import type { IdempotencyRecord } from '../../domain/model/IdempotencyRecord.js';

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly records = new Map<string, IdempotencyRecord>();

  find(messageId: string, now: number): Promise<IdempotencyRecord | null> {
    const record = this.records.get(messageId);
    if (!record || record.expiresAt <= now) return Promise.resolve(null);
    return Promise.resolve(record);
  }

  save(record: IdempotencyRecord): Promise<void> {
    this.records.set(record.messageId, record);
    return Promise.resolve();
  }

  purgeExpired(now: number): Promise<number> {
    let purged = 0;
    for (const [messageId, record] of this.records) {
      if (record.expiresAt <= now) {
        this.records.delete(messageId);
        purged++;
      }
    }
    return Promise.resolve(purged);
  }
}
