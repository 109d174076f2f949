import type { LeaseRecord, LeaseStore } from '../../domain/ports/LeaseStore.js';

/** Single-process lease store. Each method runs synchronously, which makes create-if-absent atomic. */
export class InMemoryLeaseStore implements LeaseStore {
  private readonly leases = new Map<string, LeaseRecord>();

  createIfAbsent(record: LeaseRecord, now: number): Promise<boolean> {
    if (this.live(record.resourceKey, now)) {
      return Promise.resolve(false);
    }
    this.leases.set(record.resourceKey, record);
    return Promise.resolve(true);
  }

  read(resourceKey: string, now: number): Promise<LeaseRecord | null> {
    return Promise.resolve(this.live(resourceKey, now));
  }

  extend(resourceKey: string, holderId: string, expiresAt: number, now: number): Promise<boolean> {
    const current = this.live(resourceKey, now);
    if (!current || current.holderId !== holderId) {
      return Promise.resolve(false);
    }
    this.leases.set(resourceKey, { ...current, expiresAt });
    return Promise.resolve(true);
  }

  delete(resourceKey: string, holderId: string): Promise<boolean> {
    const current = this.leases.get(resourceKey);
    if (!current || current.holderId !== holderId) {
      return Promise.resolve(false);
    }
    this.leases.delete(resourceKey);
    return Promise.resolve(true);
  }

  private live(resourceKey: string, now: number): LeaseRecord | null {
    const current = this.leases.get(resourceKey);
    if (!current || current.expiresAt <= now) return null;
    return current;
  }
}
