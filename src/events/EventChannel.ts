/**
 * Minimal typed publish/subscribe channel.
 *
 * Listeners run synchronously in registration order; a listener's returned
 * promise is not awaited. Throwing or rejecting listeners are logged and do not
 * stop delivery to the others.
 */

export type Listener<T> = (event: T) => void | Promise<void>;

export type Unsubscribe = () => void;

export class EventChannel<T> {
  private readonly listeners = new Set<Listener<T>>();

  constructor(private readonly name: string) {}

  subscribe(listener: Listener<T>): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: T): void {
    for (const listener of [...this.listeners]) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.report(error));
        }
      } catch (error) {
        this.report(error);
      }
    }
  }

  listenerCount(): number {
    return this.listeners.size;
  }

  private report(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[EventChannel:${this.name}] Listener failed: ${message}`);
  }
}
