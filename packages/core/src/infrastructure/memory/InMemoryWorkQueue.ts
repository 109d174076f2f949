import type { WorkQueue } from '../../domain/ports/WorkQueue.js';
import type { ShardMessage } from '../../domain/model/PredictionRequest.js';

/**
 * Buffering work queue for tests and single-process runs.
 *
 * Messages stay queued until `drain()` hands them out. `delivered` keeps every
 * message ever drained so a test can redeliver one to simulate at-least-once
 * delivery.
 */
export class InMemoryWorkQueue implements WorkQueue {
  private queued: ShardMessage[] = [];
  private readonly history: ShardMessage[] = [];

  publish(message: ShardMessage): Promise<void> {
    this.queued.push(message);
    return Promise.resolve();
  }

  /** Take every queued message, oldest first. */
  drain(): ShardMessage[] {
    const messages = this.queued;
    this.queued = [];
    this.history.push(...messages);
    return messages;
  }

  get pending(): number {
    return this.queued.length;
  }

  get delivered(): readonly ShardMessage[] {
    return this.history;
  }
}
