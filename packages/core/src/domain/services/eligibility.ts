import type { EntityCandidate } from '../ports/EntitySource.js';
import type { ShardEntity } from '../model/PredictionRequest.js';

export type ExclusionReason = 'NO_SCHEDULED_EVENT' | 'MISSING_INPUTS' | 'WITHDRAWN' | 'DUPLICATE_ENTITY';

export interface EligibilitySelection {
  readonly eligible: readonly ShardEntity[];
  readonly excluded: Readonly<Record<ExclusionReason, number>>;
}

/**
 * Keep candidates with a scheduled event, their required inputs present and
 * not withdrawn. Each entity is kept once; order follows the input.
 */
export function selectEligible(candidates: readonly EntityCandidate[]): EligibilitySelection {
  const excluded: Record<ExclusionReason, number> = {
    NO_SCHEDULED_EVENT: 0,
    MISSING_INPUTS: 0,
    WITHDRAWN: 0,
    DUPLICATE_ENTITY: 0,
  };
  const eligible: ShardEntity[] = [];
  const seen = new Set<string>();

  for (const candidate of candidates) {
    if (!candidate.hasScheduledEvent || candidate.eventId === null) {
      excluded.NO_SCHEDULED_EVENT++;
      continue;
    }
    if (!candidate.hasRequiredInputs) {
      excluded.MISSING_INPUTS++;
      continue;
    }
    if (candidate.withdrawn) {
      excluded.WITHDRAWN++;
      continue;
    }
    if (seen.has(candidate.entityId)) {
      excluded.DUPLICATE_ENTITY++;
      continue;
    }
    seen.add(candidate.entityId);
    eligible.push({
      entityId: candidate.entityId,
      eventId: candidate.eventId,
      quotedLine: candidate.quotedLine,
      lineSource: candidate.lineSource,
    });
  }

  return { eligible, excluded };
}
