import { createLogger, Logger } from "../logger";
import {
  BusEvent,
  BusPort,
  EventHandler,
  EventOf,
  EventType,
  isEventOf,
} from "./types";

/**
 * In-memory bus implementation for testing and development
 *
 * Handlers run in-process and are awaited by `publish`, so a test can assert
 * on side effects right after publishing.
 */
export class MemoryBus implements BusPort {
  private handlers = new Map<EventType, EventHandler[]>();
  private publishedEvents: BusEvent[] = [];
  private logger: Logger;

  constructor(private serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = logger ?? createLogger(serviceName);
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventOf<K>>
  ): Promise<void> {
    const registered = this.handlers.get(topic) ?? [];
    if (registered.length === 0) {
      this.logger.info(`Subscribed to topic: ${topic}`);
    }

    registered.push(async (event) => {
      if (isEventOf(event, topic)) {
        await handler(event);
      }
    });
    this.handlers.set(topic, registered);
  }

  async publish(event: BusEvent): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);

    this.publishedEvents.push(event);

    const handlers = this.handlers.get(event.type) ?? [];

    const promises = handlers.map(async (handler) => {
      try {
        await handler(event);
      } catch (error) {
        // Don't throw - let other handlers continue
        this.logger.error(
          `Handler error for ${event.type} (${event.id}):`,
          error
        );
      }
    });

    await Promise.all(promises);
  }

  async close(): Promise<void> {
    this.logger.info("Closing memory bus (clearing handlers)");
    this.handlers.clear();
    this.publishedEvents = [];
  }

  /**
   * Get all published events (useful for testing)
   */
  getPublishedEvents(): BusEvent[] {
    return [...this.publishedEvents];
  }

  clearHistory(): void {
    this.publishedEvents = [];
  }

  getStatus() {
    return {
      service: this.serviceName,
      subscribedTopics: Array.from(this.handlers.keys()),
      handlerCount: Array.from(this.handlers.values()).reduce(
        (sum, handlers) => sum + handlers.length,
        0
      ),
      publishedEventCount: this.publishedEvents.length,
    };
  }
}

export function createMemoryBus(
  serviceName?: string,
  logger?: Logger
): MemoryBus {
  return new MemoryBus(serviceName, logger);
}
