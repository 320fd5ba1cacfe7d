import EventEmitter from 'eventemitter3';

export type EventMap = Record<string, unknown>;

/**
 * Typed facade over eventemitter3. Every component owns its own bus so no
 * listener list is shared across component boundaries.
 */
export class EventBus<Events extends EventMap> {
  private emitter = new EventEmitter();

  on<K extends keyof Events & string>(
    event: K,
    listener: (payload: Events[K]) => void
  ): () => void {
    this.emitter.on(event, listener);
    return () => this.off(event, listener);
  }

  once<K extends keyof Events & string>(
    event: K,
    listener: (payload: Events[K]) => void
  ): void {
    this.emitter.once(event, listener);
  }

  off<K extends keyof Events & string>(
    event: K,
    listener: (payload: Events[K]) => void
  ): void {
    this.emitter.off(event, listener);
  }

  emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
    this.emitter.emit(event, payload);
  }

  listenerCount(event: keyof Events & string): number {
    return this.emitter.listenerCount(event);
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}
