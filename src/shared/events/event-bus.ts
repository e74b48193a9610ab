import { EventEmitter } from "events";
import { config } from "@/shared/config/environment";
import { createModuleLogger } from "@/shared/config/logger";
import { generateUUID } from "@/shared/utils/crypto";
import type { IntegrationEvent } from "./event.types";
import type { MessageBroker } from "./message-broker";

const moduleLogger = createModuleLogger("EventBus");

export interface EventHandler<TEvent extends IntegrationEvent = IntegrationEvent> {
  handle(event: TEvent): Promise<void>;
}

export class EventBus extends EventEmitter {
  private handlers: Map<string, EventHandler[]> = new Map();

  constructor(
    private readonly broker: MessageBroker,
    private readonly channel: string = config.messaging.eventsChannel
  ) {
    super();
    this.setMaxListeners(100);
  }

  public registerHandler(eventType: string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType) ?? [];
    handlers.push(handler);
    this.handlers.set(eventType, handlers);

    moduleLogger.info(`Handler registered for event: ${eventType}`);
  }

  public unregisterHandler(eventType: string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      const index = handlers.indexOf(handler);
      if (index > -1) {
        handlers.splice(index, 1);
        moduleLogger.info(`Handler unregistered for event: ${eventType}`);
      }
    }
  }

  // Runs every in-process handler; one failing handler does not stop the others
  public async publishLocal(event: IntegrationEvent): Promise<void> {
    const handlers = this.handlers.get(event.eventType) ?? [];

    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler.handle(event);
          moduleLogger.debug({ eventId: event.eventId }, `Handler executed for event: ${event.eventType}`);
        } catch (error) {
          moduleLogger.error({ err: error, eventId: event.eventId }, `Handler failed for event: ${event.eventType}`);
        }
      })
    );

    this.emit(event.eventType, event);
  }

  public async publishDistributed(event: IntegrationEvent): Promise<void> {
    try {
      await this.broker.publish(this.channel, event);
      moduleLogger.info(
        { eventId: event.eventId, channel: this.channel },
        `Distributed event published: ${event.eventType}`
      );
    } catch (error) {
      moduleLogger.error({ err: error, eventId: event.eventId }, "Failed to publish distributed event");
      throw error;
    }
  }

  public async publish(event: IntegrationEvent): Promise<void> {
    await this.publishLocal(event);
    await this.publishDistributed(event);
  }

  public createEvent<TType extends string, TData>(
    eventType: TType,
    data: TData,
    timestamp: Date = new Date()
  ): IntegrationEvent<TType, TData> {
    return {
      eventType,
      eventId: generateUUID(),
      timestamp: timestamp.toISOString(),
      data,
    };
  }
}
