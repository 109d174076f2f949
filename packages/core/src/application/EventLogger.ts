import type { DomainEvent, EventType } from '../domain/events/DomainEvents.js';
import type { Logger, LogLevel } from '../domain/ports/Logger.js';
import type { EventBus } from './EventBus.js';

const EVENT_LEVELS: Record<EventType, LogLevel> = {
  'batch:started': 'info',
  'batch:status_changed': 'info',
  'batch:timed_out': 'warn',
  'shard:dispatched': 'debug',
  'shard:publish_failed': 'error',
  'shard:started': 'debug',
  'shard:duplicate': 'debug',
  'shard:staged': 'debug',
  'shard:completed': 'info',
  'shard:late_report': 'warn',
  'result:rejected': 'warn',
  'entity:omitted': 'debug',
  'consolidation:started': 'info',
  'consolidation:contended': 'info',
  'consolidation:completed': 'info',
  'consolidation:needs_review': 'error',
  'consolidation:lease_lost': 'warn',
  'grading:started': 'info',
  'grading:contended': 'info',
  'grading:pending': 'warn',
  'grading:completed': 'info',
  'grading:lease_lost': 'warn',
  'circuit:state_changed': 'warn',
  'operation:retried': 'warn',
};

/** Log level used for an event type. */
export function eventLevel(type: EventType): LogLevel {
  return EVENT_LEVELS[type];
}

/**
 * Subscribe `logger` to every event on `bus`, one structured line per event.
 *
 * @returns A function that detaches the logger again.
 */
export function attachEventLogger(bus: EventBus, logger: Logger): () => void {
  const handler = (event: DomainEvent): void => {
    const { type, timestamp, ...fields } = event;
    logger[EVENT_LEVELS[type]](type, { ...fields, at: new Date(timestamp).toISOString() });
  };
  bus.onAny(handler);
  return () => bus.offAny(handler);
}
