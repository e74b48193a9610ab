import { createModuleLogger } from "@/shared/config/logger";
import { ConflictError, NotFoundError } from "@/shared/types/common.types";
import type { EventBus } from "@/shared/events/event-bus";
import { DentistCreatedEventData, EventTypes } from "@/shared/events/event.types";
import type { Dentist, DentistInput, DentistPage } from "../models/dentist.model";
import type { DentistRepository } from "../repositories/dentist.repository";

const moduleLogger = createModuleLogger("DentistService");

const duplicateEmail = (email: string): ConflictError =>
  new ConflictError(`A dentist with email '${email}' already exists.`);

export class DentistService {
  constructor(
    private readonly dentistRepository: DentistRepository,
    private readonly eventBus: EventBus,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createDentist(input: DentistInput): Promise<Dentist> {
    if (await this.dentistRepository.findByEmail(input.email)) {
      throw duplicateEmail(input.email);
    }

    const dentist = await this.dentistRepository.create({
      name: input.name.trim(),
      email: input.email.trim(),
      phone: input.phone.trim(),
      licenseNumber: input.licenseNumber.trim(),
      specialization: input.specialization.trim(),
      userId: null,
      isActive: true,
    });

    moduleLogger.info({ dentistId: dentist.id }, "Dentist created successfully");
    return dentist;
  }

  /** Creates the dentist, then asks the auth service to provision its user account. */
  async createDentistWithAuth(input: DentistInput): Promise<Dentist> {
    const dentist = await this.createDentist(input);

    const event = this.eventBus.createEvent<typeof EventTypes.DENTIST_CREATED, DentistCreatedEventData>(
      EventTypes.DENTIST_CREATED,
      {
        dentistId: dentist.id,
        name: dentist.name,
        email: dentist.email,
        licenseNumber: dentist.licenseNumber,
        specialization: dentist.specialization,
      },
      this.now()
    );

    await this.eventBus.publish(event);

    moduleLogger.info({ dentistId: dentist.id, eventId: event.eventId }, "Dentist creation announced");
    return dentist;
  }

  async getDentistById(id: number): Promise<Dentist | null> {
    return this.dentistRepository.findById(id);
  }

  async getDentistByEmail(email: string): Promise<Dentist | null> {
    return this.dentistRepository.findByEmail(email);
  }

  async getDentists(page: number, pageSize: number): Promise<DentistPage> {
    return this.dentistRepository.findAll({ page, pageSize });
  }

  async getActiveDentists(): Promise<Dentist[]> {
    return this.dentistRepository.findActive();
  }

  async updateDentist(id: number, input: DentistInput): Promise<Dentist> {
    const existing = await this.dentistRepository.findById(id);
    if (!existing) {
      throw new NotFoundError(`Dentist with ID ${id} not found.`);
    }

    if (existing.email.toLowerCase() !== input.email.toLowerCase()) {
      if (await this.dentistRepository.findByEmail(input.email)) {
        throw duplicateEmail(input.email);
      }
    }

    const dentist = await this.dentistRepository.update({
      ...existing,
      name: input.name.trim(),
      email: input.email.trim(),
      phone: input.phone.trim(),
      licenseNumber: input.licenseNumber.trim(),
      specialization: input.specialization.trim(),
      isActive: input.isActive ?? existing.isActive,
      updatedAt: this.now(),
    });

    moduleLogger.info({ dentistId: id }, "Dentist updated successfully");
    return dentist;
  }

  async deleteDentist(id: number): Promise<boolean> {
    const deleted = await this.dentistRepository.delete(id);
    if (deleted) {
      moduleLogger.info({ dentistId: id }, "Dentist deleted");
    }
    return deleted;
  }
}
