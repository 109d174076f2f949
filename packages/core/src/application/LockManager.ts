import type { Lease, AcquireLeaseResult, RenewLeaseResult } from '../domain/model/Lease.js';
import type { LeaseStore } from '../domain/ports/LeaseStore.js';

export interface LockManagerOptions {
  readonly now?: () => number;
}

/**
 * Leases over resource keys: at most one holder per key at a time.
 *
 * The only synchronization primitive of the system. Built on the two
 * `LeaseStore` primitives, atomic create-if-absent and TTL expiry, so a
 * holder that dies simply loses its lease once the TTL runs out.
 */
export class LockManager {
  private readonly now: () => number;

  constructor(
    private readonly store: LeaseStore,
    options: LockManagerOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  async acquire(resourceKey: string, holderId: string, ttlMs: number): Promise<AcquireLeaseResult> {
    if (ttlMs <= 0) {
      throw new Error('Lease TTL must be positive');
    }
    const now = this.now();
    const lease: Lease = { resourceKey, holderId, acquiredAt: now, ttlMs, expiresAt: now + ttlMs };
    const created = await this.store.createIfAbsent(
      { resourceKey, holderId, acquiredAt: now, expiresAt: lease.expiresAt },
      now,
    );
    if (created) {
      return { acquired: true, lease };
    }

    const current = await this.store.read(resourceKey, now);
    return { acquired: false, reason: 'ALREADY_HELD', heldBy: current?.holderId ?? null };
  }

  /** Extend a held lease by its TTL. Fails once the lease expired or changed hands. */
  async renew(lease: Lease): Promise<RenewLeaseResult> {
    const now = this.now();
    const expiresAt = now + lease.ttlMs;
    const extended = await this.store.extend(lease.resourceKey, lease.holderId, expiresAt, now);
    if (!extended) {
      return { renewed: false, reason: 'LEASE_LOST' };
    }
    return { renewed: true, lease: { ...lease, expiresAt } };
  }

  /** @returns `true` if the lease was still held and is now released. */
  async release(lease: Lease): Promise<boolean> {
    return this.store.delete(lease.resourceKey, lease.holderId);
  }

  /**
   * Run `fn` while holding the lease on `resourceKey`, releasing it afterwards
   * whatever `fn` does. `fn` is not called when another holder has the key.
   */
  async withLease<T>(
    resourceKey: string,
    holderId: string,
    ttlMs: number,
    fn: (lease: Lease) => Promise<T>,
  ): Promise<{ readonly acquired: true; readonly value: T } | { readonly acquired: false; readonly heldBy: string | null }> {
    const result = await this.acquire(resourceKey, holderId, ttlMs);
    if (!result.acquired) {
      return { acquired: false, heldBy: result.heldBy };
    }
    try {
      return { acquired: true, value: await fn(result.lease) };
    } finally {
      await this.release(result.lease);
    }
  }
}
