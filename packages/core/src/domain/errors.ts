/** Failure categories. Each one has its own propagation policy. */
export type ErrorCategory = 'transient_infra' | 'contention' | 'data_integrity' | 'fatal';

/** Base class of every error raised by predgrid. */
export class PredgridError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    context: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.category = category;
    this.context = context;
  }
}

/** Queue, staging or store I/O hiccup. Retried locally with backoff. */
export class TransientInfraError extends PredgridError {
  constructor(message: string, context: Readonly<Record<string, unknown>> = {}, options?: { cause?: unknown }) {
    super(message, 'TRANSIENT_INFRA', 'transient_infra', context, options);
  }
}

/** A batch for the same target date is still active. */
export class AlreadyRunningError extends PredgridError {
  constructor(
    readonly targetDate: string,
    readonly activeBatchId: string | null,
  ) {
    super(
      activeBatchId
        ? `Batch ${activeBatchId} is already running for ${targetDate}`
        : `Another batch is being started for ${targetDate}`,
      'ALREADY_RUNNING',
      'contention',
      { targetDate, activeBatchId },
    );
  }
}

/** The shard cannot be processed at all (malformed request, unknown strategy). Never retried. */
export class FatalShardError extends PredgridError {
  constructor(message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(message, 'FATAL_SHARD', 'fatal', context);
  }
}

/** The circuit of a downstream dependency is open; the call was not attempted. */
export class CircuitOpenError extends PredgridError {
  constructor(
    readonly dependency: string,
    readonly retryAt: number,
  ) {
    super(`Circuit for ${dependency} is open until ${new Date(retryAt).toISOString()}`, 'CIRCUIT_OPEN', 'transient_infra', {
      dependency,
      retryAt,
    });
  }
}

export class BatchNotFoundError extends PredgridError {
  constructor(readonly batchId: string) {
    super(`Batch ${batchId} not found`, 'BATCH_NOT_FOUND', 'fatal', { batchId });
  }
}

export class ShardNotFoundError extends PredgridError {
  constructor(
    readonly batchId: string,
    readonly shardId: string,
  ) {
    super(`Shard ${shardId} not found in batch ${batchId}`, 'SHARD_NOT_FOUND', 'fatal', { batchId, shardId });
  }
}

/** A requested status change would move the batch backwards or skip a phase. */
export class InvalidTransitionError extends PredgridError {
  constructor(batchId: string, from: string, to: string) {
    super(`Cannot transition batch ${batchId} from ${from} to ${to}`, 'INVALID_TRANSITION', 'data_integrity', {
      batchId,
      from,
      to,
    });
  }
}

/** A shard may only be re-dispatched while its batch still waits for it or was finalized without it. */
export class RedispatchNotAllowedError extends PredgridError {
  constructor(batchId: string, shardId: string, reason: string) {
    super(`Cannot re-dispatch shard ${shardId} of batch ${batchId}: ${reason}`, 'REDISPATCH_NOT_ALLOWED', 'data_integrity', {
      batchId,
      shardId,
    });
  }
}

/** Whether an error is worth retrying locally. */
export function isTransient(error: unknown): boolean {
  if (error instanceof PredgridError) {
    return error.category === 'transient_infra' && !(error instanceof CircuitOpenError);
  }
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
