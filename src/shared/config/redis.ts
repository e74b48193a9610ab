import { createClient } from "redis";
import type { MessageBroker, MessageCallback } from "@/shared/events/message-broker";
import { config } from "./environment";
import { createModuleLogger } from "./logger";

const moduleLogger = createModuleLogger("RedisManager");

type RedisClient = ReturnType<typeof createClient>;

const parseMessage = (message: string): unknown => {
  try {
    return JSON.parse(message);
  } catch {
    return message;
  }
};

/**
 * Pub/sub over Redis. Publisher and subscriber use separate connections since a
 * subscribed connection cannot issue other commands. Connections open on first use
 * or on an explicit `connect()`.
 */
export class RedisManager implements MessageBroker {
  private publisher: RedisClient | null = null;
  private subscriber: RedisClient | null = null;
  private connecting: Promise<void> | null = null;

  constructor(private readonly options: typeof config.redis = config.redis) {}

  public async connect(): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.openConnections().catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    }
    await this.connecting;
  }

  public async publish(channel: string, message: unknown): Promise<void> {
    const publisher = await this.getPublisher();
    await publisher.publish(channel, JSON.stringify(message));
    moduleLogger.debug({ channel }, "Message published");
  }

  public async subscribe(channel: string, callback: MessageCallback): Promise<void> {
    const subscriber = await this.getSubscriber();

    await subscriber.subscribe(channel, (message: string) => {
      Promise.resolve(callback(parseMessage(message))).catch((error: unknown) => {
        moduleLogger.error({ err: error, channel }, "Subscriber failed to handle message");
      });
    });

    moduleLogger.info({ channel }, "Subscribed to channel");
  }

  public async unsubscribe(channel: string): Promise<void> {
    if (this.subscriber) {
      await this.subscriber.unsubscribe(channel);
    }
  }

  public async close(): Promise<void> {
    const clients = [this.publisher, this.subscriber].filter((client): client is RedisClient => client !== null);
    this.publisher = null;
    this.subscriber = null;
    this.connecting = null;

    try {
      await Promise.all(clients.map((client) => client.quit()));
      moduleLogger.info("Redis connections closed");
    } catch (error) {
      moduleLogger.error({ err: error }, "Error closing Redis connections");
    }
  }

  private async getPublisher(): Promise<RedisClient> {
    await this.connect();
    if (!this.publisher) {
      throw new Error("Redis publisher is not connected");
    }
    return this.publisher;
  }

  private async getSubscriber(): Promise<RedisClient> {
    await this.connect();
    if (!this.subscriber) {
      throw new Error("Redis subscriber is not connected");
    }
    return this.subscriber;
  }

  private async openConnections(): Promise<void> {
    const publisher = createClient({
      socket: {
        host: this.options.host,
        port: this.options.port,
      },
      ...(this.options.password ? { password: this.options.password } : {}),
      database: this.options.db,
    });
    const subscriber = publisher.duplicate();

    publisher.on("error", (error: unknown) => moduleLogger.error({ err: error }, "❌ Redis publisher error"));
    subscriber.on("error", (error: unknown) => moduleLogger.error({ err: error }, "❌ Redis subscriber error"));

    await Promise.all([publisher.connect(), subscriber.connect()]);

    this.publisher = publisher;
    this.subscriber = subscriber;
    moduleLogger.info("✅ Redis connections established");
  }
}
