import { describeError } from "../../agent/src/errors.js";

export type EventHandler<T> = (event: T) => void | Promise<void>;

export interface EventPublisher<T> {
  publish(event: T): void;
}

/**
 * Fire-and-forget publish/subscribe channel. A subscriber that throws or
 * rejects is logged and skipped; publishers never see its failure.
 */
export class EventBus<T> implements EventPublisher<T> {
  private readonly handlers = new Set<EventHandler<T>>();
  private readonly events: T[] = [];

  constructor(private readonly maxEvents = 1000) {}

  subscribe(handler: EventHandler<T>): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  publish(event: T): void {
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.shift();
    }

    for (const handler of [...this.handlers]) {
      try {
        const result: unknown = handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            console.error(
              `⚠️ Event subscriber failed: ${describeError(error)}`,
            );
          });
        }
      } catch (error) {
        console.error(`⚠️ Event subscriber failed: ${describeError(error)}`);
      }
    }
  }

  history(filter?: (event: T) => boolean, limit?: number): T[] {
    const matching = filter ? this.events.filter(filter) : [...this.events];
    return limit === undefined ? matching : matching.slice(-limit);
  }

  get subscriberCount(): number {
    return this.handlers.size;
  }
}
