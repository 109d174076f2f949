import type { ResultQuery, SharedStore } from '../../domain/ports/SharedStore.js';
import type { BusinessKey, PredictionResult } from '../../domain/model/PredictionResult.js';
import { businessKeyOf } from '../../domain/model/PredictionResult.js';
import type { GradeRecord } from '../../domain/model/GradeRecord.js';

/**
 * Non-persistent shared store. Results and grades are maps keyed by the
 * serialized business key, so an upsert can never produce a duplicate.
 */
export class InMemorySharedStore implements SharedStore {
  private readonly results = new Map<string, PredictionResult>();
  private readonly grades = new Map<string, GradeRecord>();

  upsertResults(rows: readonly PredictionResult[]): Promise<number> {
    for (const row of rows) {
      this.results.set(businessKeyOf(row), row);
    }
    return Promise.resolve(rows.length);
  }

  countResultKeys(keys: readonly BusinessKey[]): Promise<number> {
    return Promise.resolve(new Set(keys.map(businessKeyOf).filter((k) => this.results.has(k))).size);
  }

  findResults(query: ResultQuery): Promise<readonly PredictionResult[]> {
    const rows = [...this.results.values()].filter(
      (r) =>
        r.targetDate === query.targetDate &&
        (query.strategyIds === undefined || query.strategyIds.includes(r.strategyId)) &&
        (query.includeVoided === true || r.voided !== true),
    );
    return Promise.resolve(rows);
  }

  markVoided(keys: readonly BusinessKey[], reason: string): Promise<number> {
    let marked = 0;
    for (const key of keys) {
      const serialized = businessKeyOf(key);
      const current = this.results.get(serialized);
      if (current && current.voided !== true) {
        this.results.set(serialized, { ...current, voided: true, voidReason: reason });
        marked++;
      }
    }
    return Promise.resolve(marked);
  }

  upsertGrades(grades: readonly GradeRecord[]): Promise<number> {
    for (const grade of grades) {
      this.grades.set(businessKeyOf(grade), grade);
    }
    return Promise.resolve(grades.length);
  }

  countGradeKeys(keys: readonly BusinessKey[]): Promise<number> {
    return Promise.resolve(new Set(keys.map(businessKeyOf).filter((k) => this.grades.has(k))).size);
  }

  findGradedKeys(targetDate: string): Promise<ReadonlySet<string>> {
    const keys = new Set<string>();
    for (const [key, grade] of this.grades) {
      if (grade.targetDate === targetDate) keys.add(key);
    }
    return Promise.resolve(keys);
  }

  findGrades(targetDate: string): Promise<readonly GradeRecord[]> {
    return Promise.resolve([...this.grades.values()].filter((g) => g.targetDate === targetDate));
  }
}
