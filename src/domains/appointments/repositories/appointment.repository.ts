import type {
  Appointment,
  AppointmentFilters,
  AppointmentPage,
  CreateAppointmentData,
} from "../models/appointment.model";

export type SlotOwner = "customer" | "dentist";

// Raised by a store when a write would give a customer or dentist two live appointments at one instant
export class DuplicateSlotError extends Error {
  constructor(public readonly owner: SlotOwner) {
    super(`Duplicate ${owner} appointment slot`);
    this.name = "DuplicateSlotError";
  }
}

export interface AppointmentRepository {
  create(data: CreateAppointmentData): Promise<Appointment>;
  findById(id: number): Promise<Appointment | null>;
  findByCustomerId(customerId: number): Promise<Appointment[]>;
  findByDentistId(dentistId: number): Promise<Appointment[]>;
  findByDateRange(startDate: Date, endDate: Date): Promise<Appointment[]>;
  findAll(filters: AppointmentFilters): Promise<AppointmentPage>;
  /** Non-cancelled appointment of the customer at exactly `dateTime`, other than `excludeId`. */
  hasCustomerConflict(customerId: number, dateTime: Date, excludeId?: number): Promise<boolean>;
  /** Non-cancelled appointment of the dentist at exactly `dateTime`, other than `excludeId`. */
  hasDentistConflict(dentistId: number, dateTime: Date, excludeId?: number): Promise<boolean>;
  /** @throws NotFoundError when no appointment has this id */
  update(appointment: Appointment): Promise<Appointment>;
  delete(id: number): Promise<boolean>;
}
