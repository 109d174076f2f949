/** A time-bounded exclusive claim on a resource key. */
export interface Lease {
  readonly resourceKey: string;
  readonly holderId: string;
  readonly acquiredAt: number;
  readonly ttlMs: number;
  readonly expiresAt: number;
}

/** Result of attempting to acquire a lease. Contention is an expected outcome, not an error. */
export type AcquireLeaseResult =
  | { readonly acquired: true; readonly lease: Lease }
  | { readonly acquired: false; readonly reason: 'ALREADY_HELD'; readonly heldBy: string | null };

/** Result of renewing a lease. */
export type RenewLeaseResult =
  | { readonly renewed: true; readonly lease: Lease }
  | { readonly renewed: false; readonly reason: 'LEASE_LOST' };
