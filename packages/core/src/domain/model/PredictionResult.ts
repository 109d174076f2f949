/** Betting-style recommendation produced by a strategy. */
export const Recommendation = {
  OVER: 'OVER',
  UNDER: 'UNDER',
  PASS: 'PASS',
  HOLD: 'HOLD',
} as const;

export type Recommendation = (typeof Recommendation)[keyof typeof Recommendation];

/** The tuple that identifies one logical result. Unique in the shared store at all times. */
export interface BusinessKey {
  readonly entityId: string;
  readonly eventId: string;
  readonly strategyId: string;
  readonly quotedLine: number | null;
}

/** One computed output of a strategy for an entity. */
export interface PredictionResult extends BusinessKey {
  readonly targetDate: string;
  readonly batchId: string;
  readonly value: number;
  /** Confidence in `[0, 1]`. */
  readonly confidence: number;
  readonly recommendation: Recommendation;
  readonly lineSource: string | null;
  readonly strategyVersion: string;
  readonly computedAt: number;
  /** Set by grading when the entity did not take part in the event. */
  readonly voided?: boolean;
  readonly voidReason?: string;
}

/** Key segment used for a missing quoted line. Lines are always positive. */
export const NO_LINE_KEY = '-1';

export function lineKey(quotedLine: number | null): string {
  return quotedLine === null ? NO_LINE_KEY : String(quotedLine);
}

/** Serialize a business key into a single string usable as a map key. */
export function businessKeyOf(key: BusinessKey): string {
  return [key.entityId, key.eventId, key.strategyId, lineKey(key.quotedLine)].join('|');
}

/** Reduce any keyed row to its bare business key. */
export function toBusinessKey(key: BusinessKey): BusinessKey {
  return {
    entityId: key.entityId,
    eventId: key.eventId,
    strategyId: key.strategyId,
    quotedLine: key.quotedLine,
  };
}

export function isRecommendation(value: unknown): value is Recommendation {
  return typeof value === 'string' && Object.values<string>(Recommendation).includes(value);
}
