import type { GradingDateState, GradingStateStore } from '@predgrid/core';
import type { GradingStateModel } from './models/OperationalModels.js';
import { parseEnum, toEpoch } from './utils/columns.js';

const GRADING_STATUSES: readonly GradingDateState['status'][] = ['pending', 'graded'];

export class SequelizeGradingStateStore implements GradingStateStore {
  constructor(private readonly GradingState: GradingStateModel) {}

  async get(targetDate: string): Promise<GradingDateState | null> {
    const row = await this.GradingState.findByPk(targetDate);
    if (!row) return null;
    const plain = row.get({ plain: true });
    const state: GradingDateState = {
      targetDate: plain.targetDate,
      status: parseEnum(GRADING_STATUSES, plain.status, 'grading status'),
      gradingRunId: plain.gradingRunId,
      updatedAt: toEpoch(plain.updatedAt),
    };
    return plain.reason === null ? state : { ...state, reason: plain.reason };
  }

  async save(state: GradingDateState): Promise<void> {
    await this.GradingState.upsert({
      targetDate: state.targetDate,
      status: state.status,
      reason: state.reason ?? null,
      gradingRunId: state.gradingRunId,
      updatedAt: state.updatedAt,
    });
  }
}
