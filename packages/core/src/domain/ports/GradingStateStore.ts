import type { GradingDateState } from '../model/GradingDateState.js';

export interface GradingStateStore {
  get(targetDate: string): Promise<GradingDateState | null>;
  save(state: GradingDateState): Promise<void>;
}
