/** Reference to one entity's participation in one event. */
export interface EntityEventRef {
  readonly entityId: string;
  readonly eventId: string;
}

/**
 * Realized outcome for an entity/event.
 *
 * - `verified`: the value is final and may be graded against.
 * - `unverified`: a value exists but has not been confirmed yet.
 * - `void`: the entity did not take part; predictions are voided, never graded.
 */
export interface Outcome extends EntityEventRef {
  readonly status: 'verified' | 'unverified' | 'void';
  readonly value: number | null;
  readonly reason?: string;
}

/** The outcome collaborator reports failure explicitly instead of returning nothing. */
export type OutcomeFetchResult =
  | { readonly ok: true; readonly outcomes: readonly Outcome[] }
  | { readonly ok: false; readonly reason: string };

export function entityEventKey(ref: EntityEventRef): string {
  return `${ref.entityId}|${ref.eventId}`;
}
