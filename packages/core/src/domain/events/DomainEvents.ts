import type { BatchStatus } from '../model/BatchStatus.js';
import type { CircuitStatus } from '../model/CircuitState.js';
import type { RejectionCode } from '../model/GateDecision.js';
import type { ShardOutcome } from '../ports/CompletionReporter.js';

/** Consolidation runs in `full` mode when every shard reported, `partial` after a deadline. */
export type ConsolidationMode = 'full' | 'partial';

/** Emitted when a batch is created and its shards are about to be published. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly batchId: string;
  readonly targetDate: string;
  readonly triggerSource: string;
  readonly entityCount: number;
  readonly expectedShards: number;
  readonly timestamp: number;
}

/** Emitted on every successful batch status change. */
export interface BatchStatusChangedEvent {
  readonly type: 'batch:status_changed';
  readonly batchId: string;
  readonly from: BatchStatus;
  readonly to: BatchStatus;
  readonly reason?: string;
  readonly timestamp: number;
}

/** Emitted when the deadline passes with shards still outstanding. */
export interface BatchTimedOutEvent {
  readonly type: 'batch:timed_out';
  readonly batchId: string;
  readonly completedShards: number;
  readonly expectedShards: number;
  readonly timestamp: number;
}

export interface ShardDispatchedEvent {
  readonly type: 'shard:dispatched';
  readonly batchId: string;
  readonly shardId: string;
  readonly messageId: string;
  readonly attempts: number;
  readonly timestamp: number;
}

/** Emitted when a shard could not be published after all retries. */
export interface ShardPublishFailedEvent {
  readonly type: 'shard:publish_failed';
  readonly batchId: string;
  readonly shardId: string;
  readonly attempts: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted by a worker when it begins computing a shard. */
export interface ShardStartedEvent {
  readonly type: 'shard:started';
  readonly batchId: string;
  readonly shardId: string;
  readonly messageId: string;
  readonly entityCount: number;
  readonly timestamp: number;
}

/** Emitted when a redelivered, already-processed message is acknowledged without work. */
export interface ShardDuplicateEvent {
  readonly type: 'shard:duplicate';
  readonly messageId: string;
  readonly timestamp: number;
}

export interface ShardStagedEvent {
  readonly type: 'shard:staged';
  readonly batchId: string;
  readonly shardId: string;
  readonly rowCount: number;
  readonly attempts: number;
  readonly timestamp: number;
}

/** Emitted by the worker once it settles a shard. */
export interface ShardCompletedEvent {
  readonly type: 'shard:completed';
  readonly batchId: string;
  readonly shardId: string;
  readonly outcome: ShardOutcome;
  readonly resultCount: number;
  readonly rejectedCount: number;
  readonly omittedCount: number;
  readonly reason?: string;
  readonly timestamp: number;
}

/** Emitted when a completion report arrives for a shard that is already settled. */
export interface ShardLateReportEvent {
  readonly type: 'shard:late_report';
  readonly batchId: string;
  readonly shardId: string;
  readonly messageId: string;
  readonly timestamp: number;
}

/** Emitted for every result the Validation Gate rejects. */
export interface ResultRejectedEvent {
  readonly type: 'result:rejected';
  readonly batchId: string;
  readonly shardId: string;
  readonly businessKey: string;
  readonly code: RejectionCode;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when an entity yields no result for reasons other than the gate. */
export interface EntityOmittedEvent {
  readonly type: 'entity:omitted';
  readonly batchId: string;
  readonly shardId: string;
  readonly entityId: string;
  readonly strategyId?: string;
  readonly reason: string;
  readonly timestamp: number;
}

export interface ConsolidationStartedEvent {
  readonly type: 'consolidation:started';
  readonly batchId: string;
  readonly mode: ConsolidationMode;
  readonly stagingAreas: number;
  readonly timestamp: number;
}

/** Emitted when another process already holds the batch lease. */
export interface ConsolidationContendedEvent {
  readonly type: 'consolidation:contended';
  readonly batchId: string;
  readonly heldBy: string | null;
  readonly timestamp: number;
}

export interface ConsolidationCompletedEvent {
  readonly type: 'consolidation:completed';
  readonly batchId: string;
  readonly mode: ConsolidationMode;
  readonly rowsMerged: number;
  readonly stagingAreasDeleted: number;
  readonly finalStatus: BatchStatus;
  readonly timestamp: number;
}

/** Emitted when post-merge verification fails. Staging is retained. */
export interface ConsolidationNeedsReviewEvent {
  readonly type: 'consolidation:needs_review';
  readonly batchId: string;
  readonly expectedKeys: number;
  readonly foundKeys: number;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when the lease expired before the merge could be finalized. */
export interface ConsolidationLeaseLostEvent {
  readonly type: 'consolidation:lease_lost';
  readonly batchId: string;
  readonly timestamp: number;
}

export interface GradingStartedEvent {
  readonly type: 'grading:started';
  readonly targetDate: string;
  readonly gradingRunId: string;
  readonly candidates: number;
  readonly timestamp: number;
}

export interface GradingContendedEvent {
  readonly type: 'grading:contended';
  readonly targetDate: string;
  readonly heldBy: string | null;
  readonly timestamp: number;
}

/** Emitted when verified outcomes are missing. Nothing is written for the date. */
export interface GradingPendingEvent {
  readonly type: 'grading:pending';
  readonly targetDate: string;
  readonly gradingRunId: string;
  readonly reason: string;
  readonly missing: number;
  readonly timestamp: number;
}

export interface GradingCompletedEvent {
  readonly type: 'grading:completed';
  readonly targetDate: string;
  readonly gradingRunId: string;
  readonly graded: number;
  readonly voided: number;
  readonly timestamp: number;
}

/** Emitted when the grading lease expired before grades or voids were written. */
export interface GradingLeaseLostEvent {
  readonly type: 'grading:lease_lost';
  readonly targetDate: string;
  readonly gradingRunId: string;
  readonly timestamp: number;
}

export interface CircuitStateChangedEvent {
  readonly type: 'circuit:state_changed';
  readonly dependency: string;
  readonly from: CircuitStatus;
  readonly to: CircuitStatus;
  readonly timestamp: number;
}

/** Emitted before each local retry of a transient failure. */
export interface OperationRetriedEvent {
  readonly type: 'operation:retried';
  readonly operation: string;
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Union of all domain events. */
export type DomainEvent =
  | BatchStartedEvent
  | BatchStatusChangedEvent
  | BatchTimedOutEvent
  | ShardDispatchedEvent
  | ShardPublishFailedEvent
  | ShardStartedEvent
  | ShardDuplicateEvent
  | ShardStagedEvent
  | ShardCompletedEvent
  | ShardLateReportEvent
  | ResultRejectedEvent
  | EntityOmittedEvent
  | ConsolidationStartedEvent
  | ConsolidationContendedEvent
  | ConsolidationCompletedEvent
  | ConsolidationNeedsReviewEvent
  | ConsolidationLeaseLostEvent
  | GradingStartedEvent
  | GradingContendedEvent
  | GradingPendingEvent
  | GradingCompletedEvent
  | GradingLeaseLostEvent
  | CircuitStateChangedEvent
  | OperationRetriedEvent;

/** String literal union of all event type discriminators. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
