import Redis from "ioredis";
import { createLogger, Logger } from "../logger";
import {
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventOf,
  EventType,
  isBusEvent,
  isEventOf,
  isEventType,
} from "./types";

/**
 * Redis bus implementation using pub/sub
 *
 * Publisher and subscriber use separate connections; a connection in
 * subscriber mode cannot issue PUBLISH.
 */
export class RedisBus implements BusPort {
  private subscriber: Redis;
  private publisher: Redis;
  private handlers = new Map<EventType, EventHandler[]>();
  private isConnected = false;
  private retryAttempts: number;
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    this.logger = logger ?? createLogger(config.serviceName);
    this.retryAttempts = config.retryAttempts ?? 3;
    const retryDelayMs = config.retryDelayMs ?? 1000;

    const options = {
      enableReadyCheck: false,
      maxRetriesPerRequest: this.retryAttempts,
      lazyConnect: true,
      retryStrategy: (times: number) =>
        times > this.retryAttempts ? null : retryDelayMs * times,
    };

    this.subscriber = new Redis(config.redisUrl, options);
    this.publisher = new Redis(config.redisUrl, options);

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.subscriber.on("connect", () => {
      this.logger.info("Redis subscriber connected");
      this.isConnected = true;
    });

    this.publisher.on("connect", () => {
      this.logger.info("Redis publisher connected");
    });

    this.subscriber.on("error", (error) => {
      this.logger.error("Redis subscriber error:", error);
      this.isConnected = false;
    });

    this.publisher.on("error", (error) => {
      this.logger.error("Redis publisher error:", error);
    });

    this.subscriber.on("close", () => {
      this.logger.info("Redis subscriber connection closed");
      this.isConnected = false;
    });

    this.subscriber.on("message", (channel: string, message: string) => {
      this.handleMessage(channel, message).catch((error) => {
        this.logger.error(`Failed to handle message on ${channel}:`, error);
      });
    });
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventOf<K>>
  ): Promise<void> {
    const registered = this.handlers.get(topic) ?? [];
    if (registered.length === 0) {
      await this.subscriber.subscribe(topic);
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
    try {
      await this.publisher.publish(event.type, JSON.stringify(event));
      this.logger.debug(`Published event: ${event.type} (${event.id})`);
    } catch (error) {
      this.logger.error("Failed to publish event:", error);
      throw error;
    }
  }

  private async handleMessage(channel: string, message: string): Promise<void> {
    if (!isEventType(channel)) {
      this.logger.warn(`Ignoring message on unknown channel ${channel}`);
      return;
    }

    const parsed: unknown = JSON.parse(message);
    if (!isBusEvent(parsed)) {
      this.logger.warn(`Ignoring malformed event on ${channel}`);
      return;
    }

    this.logger.debug(`Received event: ${channel} (${parsed.id})`);

    const handlers = this.handlers.get(channel) ?? [];
    const promises = handlers.map(async (handler) => {
      try {
        await handler(parsed);
      } catch (error) {
        // Don't throw - let other handlers continue
        this.logger.error(
          `Handler error for ${channel} (${parsed.id}):`,
          error
        );
      }
    });

    await Promise.all(promises);
  }

  async close(): Promise<void> {
    this.logger.info("Closing Redis bus connections...");
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    this.logger.info("Redis bus connections closed");
  }

  isHealthy(): boolean {
    return this.isConnected;
  }

  getStatus() {
    return {
      connected: this.isConnected,
      subscriberStatus: this.subscriber.status,
      publisherStatus: this.publisher.status,
      subscribedTopics: Array.from(this.handlers.keys()),
    };
  }
}

export function createRedisBus(config: BusConfig, logger?: Logger): RedisBus {
  return new RedisBus(config, logger);
}
