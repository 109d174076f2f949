import type { CircuitState } from '../domain/model/CircuitState.js';
import { CircuitStatus, closedCircuit } from '../domain/model/CircuitState.js';
import type { CircuitStateStore } from '../domain/ports/CircuitStateStore.js';
import { CircuitOpenError } from '../domain/errors.js';
import type { EventBus } from './EventBus.js';

export interface CircuitBreakerOptions {
  /** Consecutive failures that open a closed circuit. Default: 5. */
  readonly failureThreshold?: number;
  /** How long an open circuit rejects calls before probing. Default: 30 min. */
  readonly openDurationMs?: number;
  /** Successes in half-open needed to close again. Default: 2. */
  readonly halfOpenSuccesses?: number;
  readonly now?: () => number;
  readonly eventBus?: EventBus;
}

/**
 * Breaker for one downstream dependency, with its state persisted in a
 * `CircuitStateStore` so every stateless invocation sees the same circuit.
 *
 * closed → open after `failureThreshold` consecutive failures; open → half_open
 * once `openDurationMs` has elapsed; half_open → closed after
 * `halfOpenSuccesses` successes, or back to open on any failure.
 */
export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly openDurationMs: number;
  private readonly halfOpenSuccesses: number;
  private readonly now: () => number;
  private readonly eventBus: EventBus | null;

  constructor(
    readonly dependency: string,
    private readonly store: CircuitStateStore,
    options: CircuitBreakerOptions = {},
  ) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.openDurationMs = options.openDurationMs ?? 30 * 60_000;
    this.halfOpenSuccesses = options.halfOpenSuccesses ?? 2;
    this.now = options.now ?? Date.now;
    this.eventBus = options.eventBus ?? null;
  }

  /** Current state, moving an expired open circuit to half-open. */
  async state(): Promise<CircuitState> {
    const now = this.now();
    const stored = (await this.store.get(this.dependency)) ?? closedCircuit(this.dependency, now);
    if (
      stored.status === CircuitStatus.OPEN &&
      stored.openedAt !== null &&
      now - stored.openedAt >= this.openDurationMs
    ) {
      return this.save(stored, { ...stored, status: CircuitStatus.HALF_OPEN, successCount: 0, updatedAt: now });
    }
    return stored;
  }

  /** Run `fn` through the breaker. Throws `CircuitOpenError` without calling `fn` while open. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const current = await this.state();
    if (current.status === CircuitStatus.OPEN) {
      throw new CircuitOpenError(this.dependency, (current.openedAt ?? this.now()) + this.openDurationMs);
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      await this.recordFailure();
      throw error;
    }
    await this.recordSuccess();
    return result;
  }

  async recordSuccess(): Promise<void> {
    const current = await this.state();
    const now = this.now();
    if (current.status === CircuitStatus.HALF_OPEN) {
      const successCount = current.successCount + 1;
      if (successCount >= this.halfOpenSuccesses) {
        await this.save(current, closedCircuit(this.dependency, now));
      } else {
        await this.save(current, { ...current, successCount, updatedAt: now });
      }
      return;
    }
    if (current.failureCount > 0) {
      await this.save(current, { ...current, failureCount: 0, updatedAt: now });
    }
  }

  async recordFailure(): Promise<void> {
    const current = await this.state();
    const now = this.now();
    if (current.status === CircuitStatus.HALF_OPEN) {
      await this.save(current, { ...current, status: CircuitStatus.OPEN, successCount: 0, openedAt: now, updatedAt: now });
      return;
    }
    if (current.status === CircuitStatus.OPEN) return;

    const failureCount = current.failureCount + 1;
    if (failureCount >= this.failureThreshold) {
      await this.save(current, {
        ...current,
        status: CircuitStatus.OPEN,
        failureCount,
        successCount: 0,
        openedAt: now,
        updatedAt: now,
      });
    } else {
      await this.save(current, { ...current, failureCount, updatedAt: now });
    }
  }

  private async save(previous: CircuitState, next: CircuitState): Promise<CircuitState> {
    await this.store.save(next);
    if (previous.status !== next.status) {
      this.eventBus?.emit({
        type: 'circuit:state_changed',
        dependency: this.dependency,
        from: previous.status,
        to: next.status,
        timestamp: next.updatedAt,
      });
    }
    return next;
  }
}
