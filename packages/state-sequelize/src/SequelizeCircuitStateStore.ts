import type { CircuitState, CircuitStateStore } from '@predgrid/core';
import { CircuitStatus } from '@predgrid/core';
import type { CircuitModel } from './models/OperationalModels.js';
import { parseEnum, toEpoch } from './utils/columns.js';

const CIRCUIT_STATUSES = Object.values(CircuitStatus);

/** Breaker state per dependency, so an open circuit stays open across restarts. */
export class SequelizeCircuitStateStore implements CircuitStateStore {
  constructor(private readonly Circuit: CircuitModel) {}

  async get(dependency: string): Promise<CircuitState | null> {
    const row = await this.Circuit.findByPk(dependency);
    if (!row) return null;
    const plain = row.get({ plain: true });
    return {
      dependency: plain.dependency,
      status: parseEnum(CIRCUIT_STATUSES, plain.status, 'circuit status'),
      failureCount: plain.failureCount,
      successCount: plain.successCount,
      openedAt: plain.openedAt === null ? null : toEpoch(plain.openedAt),
      updatedAt: toEpoch(plain.updatedAt),
    };
  }

  async save(state: CircuitState): Promise<void> {
    await this.Circuit.upsert({ ...state });
  }
}
