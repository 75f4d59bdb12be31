export type EventType =
  | 'quote.rejected'
  | 'decision.recorded'
  | 'position.opened'
  | 'position.filled'
  | 'position.closed'
  | 'position.failed'
  | 'risk.disabled'
  | 'risk.rearmed'
  | 'config.updated'
  | 'mode.changed'
  | 'engine.halted';

export type EventHandler = (eventType: EventType, data: unknown) => void;

class EventBus {
  private readonly handlers = new Map<EventType | '*', Set<EventHandler>>();

  on(eventType: EventType | '*', handler: EventHandler): () => void {
    const set = this.handlers.get(eventType) ?? new Set<EventHandler>();
    set.add(handler);
    this.handlers.set(eventType, set);
    return () => {
      set.delete(handler);
    };
  }

  emit(eventType: EventType, data: unknown): void {
    for (const handler of this.handlers.get(eventType) ?? []) {
      handler(eventType, data);
    }
    for (const handler of this.handlers.get('*') ?? []) {
      handler(eventType, data);
    }
  }

  listenerCount(eventType: EventType | '*'): number {
    return this.handlers.get(eventType)?.size ?? 0;
  }

  clear(): void {
    this.handlers.clear();
  }
}

export const eventBus = new EventBus();
