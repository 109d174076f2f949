/** A lease as persisted by a `LeaseStore`. */
export interface LeaseRecord {
  readonly resourceKey: string;
  readonly holderId: string;
  readonly acquiredAt: number;
  readonly expiresAt: number;
}

/**
 * Port for the lock-capable key/value store backing the `LockManager`.
 *
 * Implementations need two primitives: an atomic create-if-absent, and expiry
 * by TTL. An entry whose `expiresAt` is at or before `now` counts as absent.
 * `extend()` and `delete()` only touch an entry still held by `holderId`.
 */
export interface LeaseStore {
  /**
   * Atomically store `record` unless a live entry exists for its key.
   *
   * @returns `true` if this call created the entry.
   */
  createIfAbsent(record: LeaseRecord, now: number): Promise<boolean>;
  /** Read the live entry for a key, or `null` if absent or expired. */
  read(resourceKey: string, now: number): Promise<LeaseRecord | null>;
  /** Move the expiry of a live entry held by `holderId`. */
  extend(resourceKey: string, holderId: string, expiresAt: number, now: number): Promise<boolean>;
  /** Remove the entry if `holderId` holds it. */
  delete(resourceKey: string, holderId: string): Promise<boolean>;
}
