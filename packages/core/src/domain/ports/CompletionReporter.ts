/** How a worker settled a shard. */
export type ShardOutcome = 'success' | 'partial' | 'failure';

/** Completion report sent by a worker to the Coordinator. */
export interface ShardCompletionReport {
  readonly batchId: string;
  readonly shardId: string;
  readonly messageId: string;
  readonly outcome: ShardOutcome;
  readonly resultCount: number;
  readonly rejectedCount: number;
  readonly omittedCount: number;
  readonly reason?: string;
  readonly reportedAt: number;
}

export interface CompletionReporter {
  report(report: ShardCompletionReport): Promise<void>;
}
