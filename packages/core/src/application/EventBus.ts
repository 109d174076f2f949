import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

export interface EventBusOptions {
  /** Called when a subscriber throws. The error never reaches the emitter. */
  readonly onHandlerError?: (error: unknown, event: DomainEvent) => void;
}

const isEventOf = <T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> => event.type === type;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // keyed by the subscriber's own handler so off() can find the wrapper
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly onHandlerError: (error: unknown, event: DomainEvent) => void;

  constructor(options: EventBusOptions = {}) {
    this.onHandlerError = options.onHandlerError ?? (() => undefined);
  }

  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    for (const handler of this.handlers.get(event.type)?.values() ?? []) {
      this.invoke(handler, event);
    }
    for (const handler of this.wildcardHandlers) {
      this.invoke(handler, event);
    }
  }

  private invoke(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.onHandlerError(error, event);
    }
  }
}
