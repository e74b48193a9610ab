import { createModuleLogger } from "@/shared/config/logger";
import type { UserCreatedEvent, UserCreatedEventData } from "@/shared/events/event.types";
import type { CustomerRepository } from "@/domains/customers/repositories/customer.repository";
import type { DentistRepository } from "@/domains/dentists/repositories/dentist.repository";

const moduleLogger = createModuleLogger("UserCreatedHandler");

type LinkableEntity = "customer" | "dentist";

interface LinkTarget {
  findById(id: number): Promise<{ id: number } | null>;
  findByEmail(email: string): Promise<{ id: number } | null>;
  setUserId(id: number, userId: number): Promise<boolean>;
}

/**
 * Links an auth-service user onto the customer or dentist it was created for. The entity is
 * looked up by id first and by email when the id is unknown.
 */
export class UserCreatedHandler {
  private readonly targets: Record<LinkableEntity, LinkTarget>;

  constructor(customerRepository: CustomerRepository, dentistRepository: DentistRepository) {
    this.targets = { customer: customerRepository, dentist: dentistRepository };
  }

  async handle(event: UserCreatedEvent): Promise<boolean> {
    const { data } = event;
    const entityType = data.entityType.toLowerCase();

    moduleLogger.info(
      { eventId: event.eventId, email: data.email, userId: data.userId, entityType: data.entityType },
      "Processing UserCreated event"
    );

    if (entityType !== "customer" && entityType !== "dentist") {
      moduleLogger.warn({ entityType: data.entityType, email: data.email }, "Unknown entity type");
      return false;
    }

    try {
      const linked = await this.link(entityType, data);
      if (linked) {
        moduleLogger.info({ email: data.email }, "Successfully processed UserCreated event");
      }
      return linked;
    } catch (error) {
      moduleLogger.error({ err: error, email: data.email }, "Error processing UserCreated event");
      return false;
    }
  }

  private async link(entityType: LinkableEntity, data: UserCreatedEventData): Promise<boolean> {
    const target = this.targets[entityType];

    let entity = await target.findById(data.entityId);
    if (!entity) {
      moduleLogger.warn({ entityType, entityId: data.entityId, email: data.email }, "Entity not found by id, trying email");
      entity = await target.findByEmail(data.email);
    }

    if (!entity) {
      moduleLogger.error({ entityType, email: data.email }, "Entity not found for created user");
      return false;
    }

    const updated = await target.setUserId(entity.id, data.userId);
    if (updated) {
      moduleLogger.info({ entityType, entityId: entity.id, userId: data.userId }, "Entity linked to auth user");
    }
    return updated;
  }
}
