import { createModuleLogger } from "@/shared/config/logger";

const moduleLogger = createModuleLogger("InProcessMessageBroker");

export type MessageCallback = (message: unknown) => void | Promise<void>;

// Channel-based publish/subscribe transport between this service and its peers
export interface MessageBroker {
  publish(channel: string, message: unknown): Promise<void>;
  subscribe(channel: string, callback: MessageCallback): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Delivers messages to subscribers of the same process. Messages go through a
 * JSON round trip so subscribers see what a network broker would hand them.
 */
export class InProcessMessageBroker implements MessageBroker {
  private readonly subscriptions = new Map<string, MessageCallback[]>();
  private readonly published: Array<{ channel: string; message: unknown }> = [];

  async publish(channel: string, message: unknown): Promise<void> {
    const payload: unknown = JSON.parse(JSON.stringify(message));
    this.published.push({ channel, message: payload });

    const callbacks = this.subscriptions.get(channel) ?? [];
    for (const callback of callbacks) {
      try {
        await callback(payload);
      } catch (error) {
        moduleLogger.error({ err: error, channel }, "Subscriber failed to handle message");
      }
    }
  }

  async subscribe(channel: string, callback: MessageCallback): Promise<void> {
    const callbacks = this.subscriptions.get(channel) ?? [];
    callbacks.push(callback);
    this.subscriptions.set(channel, callbacks);
  }

  async unsubscribe(channel: string): Promise<void> {
    this.subscriptions.delete(channel);
  }

  async close(): Promise<void> {
    this.subscriptions.clear();
  }

  public getPublished(channel?: string): unknown[] {
    return this.published
      .filter((entry) => channel === undefined || entry.channel === channel)
      .map((entry) => entry.message);
  }
}
