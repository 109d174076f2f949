/** An entity as listed by the system-of-record for a target date. */
export interface EntityCandidate {
  readonly entityId: string;
  readonly eventId: string | null;
  readonly hasScheduledEvent: boolean;
  readonly hasRequiredInputs: boolean;
  readonly withdrawn: boolean;
  readonly quotedLine: number | null;
  readonly lineSource: string | null;
}

/** Read access to the entities that may receive predictions on a date. */
export interface EntitySource {
  findCandidates(targetDate: string): Promise<readonly EntityCandidate[]>;
}
