import type { EntityEventRef, GradeRecord, Lease, Outcome, OutcomeFetchResult, PredictionResult } from '@predgrid/core';
import { entityEventKey, errorMessage, gradeResult, businessKeyOf, toBusinessKey } from '@predgrid/core';
import type { PipelineContext } from './PipelineContext.js';
import { Dependency } from './PipelineContext.js';

export type GradingOutcome = 'graded' | 'no_op' | 'pending' | 'contended' | 'lease_lost' | 'needs_review';

export interface GradingResult {
  readonly targetDate: string;
  readonly gradingRunId: string;
  readonly outcome: GradingOutcome;
  readonly graded: number;
  readonly voided: number;
  readonly reason?: string;
}

const DEFAULT_VOID_REASON = 'Did not participate';

/**
 * Scores stored predictions of a date against realized outcomes.
 *
 * Runs under the `grading:<date>` lease, one run per date whatever strategies
 * it covers. Grades are keyed by the business key, and results already graded
 * are skipped, so running it again is a no-op. A date whose outcomes are not
 * all verified gets nothing written and is marked `pending`. The lease is
 * renewed before each write; a run that lost it stops with `lease_lost`.
 */
export class GradingEngine {
  constructor(private readonly ctx: PipelineContext) {}

  async trigger(targetDate: string, strategyIds?: readonly string[]): Promise<GradingResult> {
    const { locks, config, eventBus } = this.ctx;
    const gradingRunId = this.ctx.newId();
    const acquired = await locks.acquire(`grading:${targetDate}`, gradingRunId, config.gradingLeaseTtlMs);
    if (!acquired.acquired) {
      eventBus.emit({ type: 'grading:contended', targetDate, heldBy: acquired.heldBy, timestamp: this.ctx.now() });
      return { targetDate, gradingRunId, outcome: 'contended', graded: 0, voided: 0 };
    }

    try {
      return await this.grade(targetDate, acquired.lease, strategyIds);
    } finally {
      await locks.release(acquired.lease);
    }
  }

  private async grade(
    targetDate: string,
    lease: Lease,
    strategyIds: readonly string[] | undefined,
  ): Promise<GradingResult> {
    const { sharedStore } = this.ctx.ports;
    const gradingRunId = lease.holderId;
    const results = await sharedStore.findResults({ targetDate, strategyIds });
    const gradedKeys = await sharedStore.findGradedKeys(targetDate);
    const candidates = results.filter((r) => !gradedKeys.has(businessKeyOf(r)));

    if (candidates.length === 0) {
      await this.saveState(targetDate, gradingRunId, 'graded');
      this.emitCompleted(targetDate, gradingRunId, 0, 0);
      return { targetDate, gradingRunId, outcome: 'no_op', graded: 0, voided: 0 };
    }

    this.ctx.eventBus.emit({
      type: 'grading:started',
      targetDate,
      gradingRunId,
      candidates: candidates.length,
      timestamp: this.ctx.now(),
    });

    const refs = uniqueRefs(candidates);
    const fetched = await this.fetchOutcomes(targetDate, refs);
    if (!fetched.ok) {
      return this.markPending(targetDate, gradingRunId, `Outcome source failed: ${fetched.reason}`, refs.length);
    }

    const outcomes = new Map<string, Outcome>();
    for (const outcome of fetched.outcomes) outcomes.set(entityEventKey(outcome), outcome);

    const missing = refs.filter((ref) => {
      const outcome = outcomes.get(entityEventKey(ref));
      if (!outcome) return true;
      if (outcome.status === 'void') return false;
      return outcome.status !== 'verified' || outcome.value === null || !Number.isFinite(outcome.value);
    });
    if (missing.length > 0) {
      return this.markPending(
        targetDate,
        gradingRunId,
        `${String(missing.length)} of ${String(refs.length)} outcomes missing or unverified`,
        missing.length,
      );
    }

    const toVoid: PredictionResult[] = [];
    const grades: GradeRecord[] = [];
    const gradedAt = this.ctx.now();
    for (const result of candidates) {
      const outcome = outcomes.get(entityEventKey(result));
      if (!outcome) continue;
      if (outcome.status === 'void') {
        toVoid.push(result);
      } else if (outcome.value !== null) {
        grades.push(
          gradeResult(result, outcome.value, { gradingRunId, gradedAt, toleranceBands: this.ctx.config.toleranceBands }),
        );
      }
    }

    if (toVoid.length > 0 && !(await this.stillHeld(lease))) {
      return this.leaseLost(targetDate, gradingRunId, 0);
    }
    const voided = await this.voidResults(toVoid, outcomes);

    if (grades.length > 0) {
      if (!(await this.stillHeld(lease))) {
        return this.leaseLost(targetDate, gradingRunId, voided);
      }
      await this.ctx.withRetry('grade upsert', this.ctx.config.retry.stagingWriteRetries, () =>
        sharedStore.upsertGrades(grades),
      );
      const found = await sharedStore.countGradeKeys(grades.map(toBusinessKey));
      if (found !== grades.length) {
        const reason = `Shared store holds ${String(found)} of ${String(grades.length)} grades`;
        await this.saveState(targetDate, gradingRunId, 'pending', reason);
        await this.ctx.alert('grading_needs_review', 'critical', `Grading of ${targetDate} failed verification`, {
          targetDate,
          gradingRunId,
          expected: grades.length,
          found,
        });
        return { targetDate, gradingRunId, outcome: 'needs_review', graded: found, voided, reason };
      }
    }

    await this.saveState(targetDate, gradingRunId, 'graded');
    this.emitCompleted(targetDate, gradingRunId, grades.length, voided);
    return { targetDate, gradingRunId, outcome: 'graded', graded: grades.length, voided };
  }

  private async stillHeld(lease: Lease): Promise<boolean> {
    return (await this.ctx.locks.renew(lease)).renewed;
  }

  private leaseLost(targetDate: string, gradingRunId: string, voided: number): GradingResult {
    this.ctx.eventBus.emit({ type: 'grading:lease_lost', targetDate, gradingRunId, timestamp: this.ctx.now() });
    return { targetDate, gradingRunId, outcome: 'lease_lost', graded: 0, voided };
  }

  /** The outcome collaborator's own failure report, or a thrown error, both end as a failed fetch. */
  private async fetchOutcomes(targetDate: string, refs: readonly EntityEventRef[]): Promise<OutcomeFetchResult> {
    const breaker = this.ctx.breaker(Dependency.OUTCOME_SOURCE);
    try {
      return await breaker.execute(() => this.ctx.ports.outcomeSource.fetchOutcomes(targetDate, refs));
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  private async voidResults(
    results: readonly PredictionResult[],
    outcomes: ReadonlyMap<string, Outcome>,
  ): Promise<number> {
    const byReason = new Map<string, PredictionResult[]>();
    for (const result of results) {
      const reason = outcomes.get(entityEventKey(result))?.reason ?? DEFAULT_VOID_REASON;
      const group = byReason.get(reason) ?? [];
      group.push(result);
      byReason.set(reason, group);
    }

    let voided = 0;
    for (const [reason, group] of byReason) {
      voided += await this.ctx.ports.sharedStore.markVoided(group.map(toBusinessKey), reason);
    }
    return voided;
  }

  private async markPending(
    targetDate: string,
    gradingRunId: string,
    reason: string,
    missing: number,
  ): Promise<GradingResult> {
    const { outcomeSource } = this.ctx.ports;
    if (outcomeSource.requestBackfill) {
      try {
        await outcomeSource.requestBackfill(targetDate);
      } catch (error) {
        this.ctx.logger.warn('Outcome backfill request failed', { targetDate, error: errorMessage(error) });
      }
    }

    await this.saveState(targetDate, gradingRunId, 'pending', reason);
    await this.ctx.alert('grading_pending', 'warning', `Grading of ${targetDate} is pending: ${reason}`, {
      targetDate,
      gradingRunId,
      missing,
    });
    this.ctx.eventBus.emit({
      type: 'grading:pending',
      targetDate,
      gradingRunId,
      reason,
      missing,
      timestamp: this.ctx.now(),
    });
    return { targetDate, gradingRunId, outcome: 'pending', graded: 0, voided: 0, reason };
  }

  private async saveState(
    targetDate: string,
    gradingRunId: string,
    status: 'pending' | 'graded',
    reason?: string,
  ): Promise<void> {
    await this.ctx.ports.gradingStates.save({ targetDate, status, reason, gradingRunId, updatedAt: this.ctx.now() });
  }

  private emitCompleted(targetDate: string, gradingRunId: string, graded: number, voided: number): void {
    this.ctx.eventBus.emit({
      type: 'grading:completed',
      targetDate,
      gradingRunId,
      graded,
      voided,
      timestamp: this.ctx.now(),
    });
  }
}

function uniqueRefs(results: readonly PredictionResult[]): EntityEventRef[] {
  const refs = new Map<string, EntityEventRef>();
  for (const r of results) {
    refs.set(entityEventKey(r), { entityId: r.entityId, eventId: r.eventId });
  }
  return [...refs.values()];
}
