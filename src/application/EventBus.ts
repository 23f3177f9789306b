import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyHandler = (event: any) => void;

/** Typed event bus for storage events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers = new Map<EventType, Set<AnyHandler>>();

  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<AnyHandler>();
    existing.add(handler as AnyHandler);
    this.handlers.set(type, existing);
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler as AnyHandler);
  }

  /** Deliver an event to every handler of its type. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        handler(event);
      } catch {
        // Subscribers never affect the stream that emitted the event.
      }
    }
  }
}
