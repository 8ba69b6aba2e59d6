import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Receives errors thrown by subscribers. */
export type HandlerErrorReporter = (error: unknown, event: DomainEvent) => void;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyHandler = (event: any) => void;

/**
 * Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`.
 *
 * A throwing handler does not prevent other handlers from running and never
 * fails the operation that emitted the event; its error goes to `reportError`.
 */
export class EventBus {
  private readonly handlers = new Map<string, Set<AnyHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly reportError: HandlerErrorReporter) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Set<AnyHandler>();
    existing.add(handler as AnyHandler);
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler as AnyHandler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  emit(event: DomainEvent): void {
    for (const handler of this.handlers.get(event.type) ?? []) {
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
      this.reportError(error, event);
    }
  }
}
