import type { CircuitStateStore } from '../../domain/ports/CircuitStateStore.js';
import type { CircuitState } from '../../domain/model/CircuitState.js';

export class InMemoryCircuitStateStore implements CircuitStateStore {
  private readonly states = new Map<string, CircuitState>();

  get(dependency: string): Promise<CircuitState | null> {
    return Promise.resolve(this.states.get(dependency) ?? null);
  }

  save(state: CircuitState): Promise<void> {
    this.states.set(state.dependency, state);
    return Promise.resolve();
  }
}
