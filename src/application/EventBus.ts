import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Typed event bus for read events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // Typed handlers are stored narrowed, keyed by the original function for `off()`.
  private readonly handlers = new Map<EventType, Map<object, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<object, WildcardHandler>();
    if (!existing.has(handler)) {
      existing.set(handler, this.narrow(type, handler));
    }
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit an event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type)?.values() ?? [];
    for (const handler of [...handlers, ...this.wildcardHandlers]) {
      try {
        handler(event);
      } catch {
        // A broken subscriber must not interrupt the read.
      }
    }
  }

  private narrow<T extends EventType>(type: T, handler: EventHandler<T>): WildcardHandler {
    return (event) => {
      if (this.isType(event, type)) handler(event);
    };
  }

  private isType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
    return event.type === type;
  }
}
