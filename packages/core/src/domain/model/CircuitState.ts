/** Circuit breaker states. */
export const CircuitStatus = {
  CLOSED: 'closed',
  OPEN: 'open',
  HALF_OPEN: 'half_open',
} as const;

export type CircuitStatus = (typeof CircuitStatus)[keyof typeof CircuitStatus];

/** Persisted breaker state of one downstream dependency. */
export interface CircuitState {
  readonly dependency: string;
  readonly status: CircuitStatus;
  /** Consecutive failures while closed. */
  readonly failureCount: number;
  /** Consecutive successes while half-open. */
  readonly successCount: number;
  readonly openedAt: number | null;
  readonly updatedAt: number;
}

export function closedCircuit(dependency: string, now: number): CircuitState {
  return {
    dependency,
    status: CircuitStatus.CLOSED,
    failureCount: 0,
    successCount: 0,
    openedAt: null,
    updatedAt: now,
  };
}
