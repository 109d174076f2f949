import type { GradingStateStore } from '../../domain/ports/GradingStateStore.js';
import type { GradingDateState } from '../../domain/model/GradingDateState.js';

export class InMemoryGradingStateStore implements GradingStateStore {
  private readonly states = new Map<string, GradingDateState>();

  get(targetDate: string): Promise<GradingDateState | null> {
    return Promise.resolve(this.states.get(targetDate) ?? null);
  }

  save(state: GradingDateState): Promise<void> {
    this.states.set(state.targetDate, state);
    return Promise.resolve();
  }
}
