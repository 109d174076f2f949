// Domain model
export { BatchStatus, ACTIVE_BATCH_STATUSES, CONSOLIDATABLE_STATUSES, canTransition, isActiveStatus } from './domain/model/BatchStatus.js';
export { ShardStatus, isTerminalShardStatus } from './domain/model/ShardStatus.js';
export type { WorkBatch, ShardState, ShardCounts } from './domain/model/WorkBatch.js';
export {
  createShardState,
  countShards,
  allShardsTerminal,
  allShardsCompleted,
  findShard,
  replaceShard,
} from './domain/model/WorkBatch.js';
export type { ShardEntity, PredictionRequest, ShardMessage } from './domain/model/PredictionRequest.js';
export type { BusinessKey, PredictionResult } from './domain/model/PredictionResult.js';
export {
  Recommendation,
  NO_LINE_KEY,
  lineKey,
  businessKeyOf,
  toBusinessKey,
  isRecommendation,
} from './domain/model/PredictionResult.js';
export type { StagingArea, StagingAreaSummary } from './domain/model/StagingArea.js';
export type { Lease, AcquireLeaseResult, RenewLeaseResult } from './domain/model/Lease.js';
export type { GradeRecord, ToleranceCheck } from './domain/model/GradeRecord.js';
export type { EntityEventRef, Outcome, OutcomeFetchResult } from './domain/model/Outcome.js';
export { entityEventKey } from './domain/model/Outcome.js';
export type { IdempotencyRecord } from './domain/model/IdempotencyRecord.js';
export type { CircuitState } from './domain/model/CircuitState.js';
export { CircuitStatus, closedCircuit } from './domain/model/CircuitState.js';
export type { GradingDateState } from './domain/model/GradingDateState.js';
export type { Alert, AlertKind, AlertSeverity } from './domain/model/Alert.js';
export type { GateDecision, RejectionCode } from './domain/model/GateDecision.js';
export { accepted, rejected } from './domain/model/GateDecision.js';

// Errors
export type { ErrorCategory } from './domain/errors.js';
export {
  PredgridError,
  TransientInfraError,
  AlreadyRunningError,
  FatalShardError,
  CircuitOpenError,
  BatchNotFoundError,
  ShardNotFoundError,
  InvalidTransitionError,
  RedispatchNotAllowedError,
  isTransient,
  errorMessage,
} from './domain/errors.js';

// Domain services
export { ShardSplitter } from './domain/services/ShardSplitter.js';
export type { ValidationGateOptions } from './domain/services/ValidationGate.js';
export { ValidationGate, DEFAULT_SENTINEL_VALUE, DEFAULT_ACCEPTED_LINE_SOURCES } from './domain/services/ValidationGate.js';
export type { EligibilitySelection, ExclusionReason } from './domain/services/eligibility.js';
export { selectEligible } from './domain/services/eligibility.js';
export type { GradeContext } from './domain/services/GradeCalculator.js';
export { DEFAULT_TOLERANCE_BANDS, computeCorrect, confidenceDecile, gradeResult } from './domain/services/GradeCalculator.js';

// Ports (for custom implementations)
export type { LeaseStore, LeaseRecord } from './domain/ports/LeaseStore.js';
export type { BatchRepository, BatchTransitionPatch } from './domain/ports/BatchRepository.js';
export type { StagingStore } from './domain/ports/StagingStore.js';
export type { SharedStore, ResultQuery } from './domain/ports/SharedStore.js';
export type { IdempotencyStore } from './domain/ports/IdempotencyStore.js';
export type { CircuitStateStore } from './domain/ports/CircuitStateStore.js';
export type { GradingStateStore } from './domain/ports/GradingStateStore.js';
export type { WorkQueue } from './domain/ports/WorkQueue.js';
export type { FeatureSource, FeatureVector } from './domain/ports/FeatureSource.js';
export type { OutcomeSource } from './domain/ports/OutcomeSource.js';
export type { AlertSink } from './domain/ports/AlertSink.js';
export type { EntitySource, EntityCandidate } from './domain/ports/EntitySource.js';
export type { CompletionReporter, ShardCompletionReport, ShardOutcome } from './domain/ports/CompletionReporter.js';
export type { PredictionStrategy, StrategyContext, StrategyOutput } from './domain/ports/PredictionStrategy.js';
export type { Logger, LogLevel, LogFields } from './domain/ports/Logger.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ConsolidationMode,
  BatchStartedEvent,
  BatchStatusChangedEvent,
  BatchTimedOutEvent,
  ShardDispatchedEvent,
  ShardPublishFailedEvent,
  ShardStartedEvent,
  ShardDuplicateEvent,
  ShardStagedEvent,
  ShardCompletedEvent,
  ShardLateReportEvent,
  ResultRejectedEvent,
  EntityOmittedEvent,
  ConsolidationStartedEvent,
  ConsolidationContendedEvent,
  ConsolidationCompletedEvent,
  ConsolidationNeedsReviewEvent,
  ConsolidationLeaseLostEvent,
  GradingStartedEvent,
  GradingContendedEvent,
  GradingPendingEvent,
  GradingCompletedEvent,
  GradingLeaseLostEvent,
  CircuitStateChangedEvent,
  OperationRetriedEvent,
} from './domain/events/DomainEvents.js';

// Application internals (for @predgrid/pipeline and other extension packages)
export { EventBus } from './application/EventBus.js';
export type { EventBusOptions } from './application/EventBus.js';
export { attachEventLogger, eventLevel } from './application/EventLogger.js';
export type { RetryOptions, RetryContext, RetryDecision } from './application/retry.js';
export { retry, backoffDelay, sleep } from './application/retry.js';
export type { CircuitBreakerOptions } from './application/CircuitBreaker.js';
export { CircuitBreaker } from './application/CircuitBreaker.js';
export type { LockManagerOptions } from './application/LockManager.js';
export { LockManager } from './application/LockManager.js';

// Configuration
export type { PipelineConfig, PipelineConfigOverrides, RetryConfig, CircuitBreakerConfig } from './config/PipelineConfig.js';
export { defaultPipelineConfig, resolvePipelineConfig, loadPipelineConfig } from './config/PipelineConfig.js';

// Infrastructure
export type { ConsoleLoggerOptions } from './infrastructure/logging/ConsoleLogger.js';
export { createConsoleLogger, formatLogLine, silentLogger } from './infrastructure/logging/ConsoleLogger.js';
export { InMemoryLeaseStore } from './infrastructure/memory/InMemoryLeaseStore.js';
export { InMemoryBatchRepository } from './infrastructure/memory/InMemoryBatchRepository.js';
export { InMemoryStagingStore } from './infrastructure/memory/InMemoryStagingStore.js';
export { InMemorySharedStore } from './infrastructure/memory/InMemorySharedStore.js';
export { InMemoryIdempotencyStore } from './infrastructure/memory/InMemoryIdempotencyStore.js';
export { InMemoryCircuitStateStore } from './infrastructure/memory/InMemoryCircuitStateStore.js';
export { InMemoryGradingStateStore } from './infrastructure/memory/InMemoryGradingStateStore.js';
export { InMemoryWorkQueue } from './infrastructure/memory/InMemoryWorkQueue.js';
export { InMemoryAlertSink } from './infrastructure/memory/InMemoryAlertSink.js';
