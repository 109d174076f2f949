import type { CircuitState } from '../model/CircuitState.js';

/** Port persisting circuit breaker state so it survives restarts. */
export interface CircuitStateStore {
  get(dependency: string): Promise<CircuitState | null>;
  save(state: CircuitState): Promise<void>;
}
