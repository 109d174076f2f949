/** One entity of a shard, as selected by the Coordinator. */
export interface ShardEntity {
  readonly entityId: string;
  readonly eventId: string;
  /** The quoted line the prediction is made against, or `null` when none is available. */
  readonly quotedLine: number | null;
  /** Data source the quoted line came from (e.g. `ODDS_API`). */
  readonly lineSource: string | null;
}

/** One unit of dispatched work: a shard of a batch. */
export interface PredictionRequest {
  readonly batchId: string;
  readonly shardId: string;
  readonly shardIndex: number;
  readonly targetDate: string;
  readonly entities: readonly ShardEntity[];
  readonly strategyIds: readonly string[];
}

/**
 * Envelope delivered by the work queue. Delivery is at-least-once, so the
 * same `messageId` may arrive more than once.
 */
export interface ShardMessage {
  readonly messageId: string;
  readonly publishedAt: number;
  readonly request: PredictionRequest;
}
