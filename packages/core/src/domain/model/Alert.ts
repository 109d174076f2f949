/** Kinds of operational alerts the core emits. Delivery is up to the alerting collaborator. */
export type AlertKind =
  | 'result_rejected'
  | 'batch_needs_review'
  | 'batch_partial'
  | 'batch_failed'
  | 'shard_failed'
  | 'grading_pending'
  | 'grading_needs_review';

export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface Alert {
  readonly kind: AlertKind;
  readonly severity: AlertSeverity;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
  readonly timestamp: number;
}
