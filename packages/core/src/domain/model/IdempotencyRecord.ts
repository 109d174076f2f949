/** Marks an inbound message as processed, for a bounded retention window. */
export interface IdempotencyRecord {
  readonly messageId: string;
  readonly processedAt: number;
  readonly expiresAt: number;
  /** How the message was settled (e.g. `success`, `partial`, `failure`). */
  readonly outcome: string;
}
