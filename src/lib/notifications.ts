import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export type Listener<T> = (payload: T) => void | Promise<void>;

export class NotificationHub<T> {
  private listeners: Listener<T>[] = [];

  constructor(
    private readonly name: string,
    private readonly logger: Logger = silentLogger
  ) {}

  get size(): number {
    return this.listeners.length;
  }

  subscribe(listener: Listener<T>): () => boolean {
    if (!this.listeners.includes(listener)) {
      this.listeners = [...this.listeners, listener];
    }
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: Listener<T>): boolean {
    const remaining = this.listeners.filter((candidate) => candidate !== listener);
    const removed = remaining.length !== this.listeners.length;
    this.listeners = remaining;
    return removed;
  }

  /**
   * Delivers the payload to every listener in subscription order and returns how many
   * returned without throwing. A failing listener is logged and skipped.
   */
  notify(payload: T): number {
    let delivered = 0;
    // The array is replaced on every (un)subscribe, so this loop sees a stable list.
    for (const listener of this.listeners) {
      try {
        const result: unknown = listener(payload);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error(`${this.name} listener rejected`, error);
          });
        }
        delivered += 1;
      } catch (error) {
        this.logger.error(`${this.name} listener failed`, error);
      }
    }
    return delivered;
  }

  clear(): void {
    this.listeners = [];
  }
}
