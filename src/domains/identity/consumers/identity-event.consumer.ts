import { config } from "@/shared/config/environment";
import { createModuleLogger } from "@/shared/config/logger";
import { userCreatedEventSchema } from "@/shared/events/event.types";
import type { MessageBroker } from "@/shared/events/message-broker";
import type { UserCreatedHandler } from "../handlers/user-created.handler";

const moduleLogger = createModuleLogger("IdentityEventConsumer");

export class IdentityEventConsumer {
  private running = false;

  constructor(
    private readonly broker: MessageBroker,
    private readonly handler: UserCreatedHandler,
    private readonly channel: string = config.messaging.userCreatedChannel
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    await this.broker.subscribe(this.channel, async (message) => {
      await this.onMessage(message);
    });
    this.running = true;
    moduleLogger.info({ channel: this.channel }, "Identity event consumer started");
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    await this.broker.unsubscribe(this.channel);
    this.running = false;
    moduleLogger.info({ channel: this.channel }, "Identity event consumer stopped");
  }

  // Malformed messages are logged and dropped
  async onMessage(message: unknown): Promise<boolean> {
    const parsed = userCreatedEventSchema.safeParse(message);
    if (!parsed.success) {
      moduleLogger.warn({ issues: parsed.error.flatten() }, "Dropping malformed identity event");
      return false;
    }

    const handled = await this.handler.handle(parsed.data);
    if (!handled) {
      moduleLogger.warn({ eventId: parsed.data.eventId }, "Identity event was not applied");
    }
    return handled;
  }
}
