import type { IdempotencyRecord } from '../model/IdempotencyRecord.js';

/** Port for message deduplication records with a retention window. */
export interface IdempotencyStore {
  /** The unexpired record for `messageId`, or `null`. */
  find(messageId: string, now: number): Promise<IdempotencyRecord | null>;
  save(record: IdempotencyRecord): Promise<void>;
  /** @returns Number of records removed. */
  purgeExpired(now: number): Promise<number>;
}
