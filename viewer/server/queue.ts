/**
 * Single-consumer event queue. Handlers run one at a time in post order;
 * an async handler finishes before the next event starts.
 */

export type EventHandler<E> = (event: E) => void | Promise<void>;
export type EventErrorHandler<E> = (error: unknown, event: E) => void;

export class EventQueue<E> {
  private pending: E[] = [];
  private draining: Promise<void> | null = null;

  constructor(
    private readonly handler: EventHandler<E>,
    private readonly onError: EventErrorHandler<E>,
  ) {}

  /** Number of events waiting, not counting the one being handled. */
  get size(): number {
    return this.pending.length;
  }

  post(event: E): void {
    this.pending.push(event);
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  /** Resolves once every event posted so far has been handled. */
  idle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  private async drain(): Promise<void> {
    // Handlers never run inside post()
    await Promise.resolve();
    while (this.pending.length > 0) {
      const [event] = this.pending.splice(0, 1);
      try {
        await this.handler(event);
      } catch (error) {
        this.onError(error, event);
      }
    }
    this.draining = null;
  }
}
