import { createModuleLogger } from "@/shared/config/logger";
import { NotFoundError } from "@/shared/types/common.types";
import {
  Appointment,
  AppointmentFilters,
  AppointmentPage,
  AppointmentStatus,
  CreateAppointmentData,
  cloneAppointment,
} from "../models/appointment.model";
import { AppointmentRepository, DuplicateSlotError, SlotOwner } from "./appointment.repository";

const moduleLogger = createModuleLogger("InMemoryAppointmentRepository");

const byDateTime = (a: Appointment, b: Appointment): number =>
  a.appointmentDateTime.getTime() - b.appointmentDateTime.getTime() || a.id - b.id;

export class InMemoryAppointmentRepository implements AppointmentRepository {
  private readonly appointments = new Map<number, Appointment>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(data: CreateAppointmentData): Promise<Appointment> {
    // Check and insert run in one synchronous step, mirroring the unique indexes of the SQL store
    this.assertSlotsFree(data);

    const timestamp = this.now();
    const appointment: Appointment = {
      ...data,
      appointmentDateTime: new Date(data.appointmentDateTime.getTime()),
      id: this.nextId++,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.appointments.set(appointment.id, appointment);
    moduleLogger.debug({ appointmentId: appointment.id }, "Appointment stored");

    return cloneAppointment(appointment);
  }

  async findById(id: number): Promise<Appointment | null> {
    const appointment = this.appointments.get(id);
    return appointment ? cloneAppointment(appointment) : null;
  }

  async findByCustomerId(customerId: number): Promise<Appointment[]> {
    return this.select((a) => a.customerId === customerId);
  }

  async findByDentistId(dentistId: number): Promise<Appointment[]> {
    return this.select((a) => a.dentistId === dentistId);
  }

  async findByDateRange(startDate: Date, endDate: Date): Promise<Appointment[]> {
    return this.select(
      (a) =>
        a.appointmentDateTime.getTime() >= startDate.getTime() && a.appointmentDateTime.getTime() <= endDate.getTime()
    );
  }

  async findAll(filters: AppointmentFilters): Promise<AppointmentPage> {
    const matching = this.select(
      (a) =>
        (filters.customerId === undefined || a.customerId === filters.customerId) &&
        (filters.dentistId === undefined || a.dentistId === filters.dentistId) &&
        (filters.startDate === undefined || a.appointmentDateTime.getTime() >= filters.startDate.getTime()) &&
        (filters.endDate === undefined || a.appointmentDateTime.getTime() <= filters.endDate.getTime()) &&
        (filters.status === undefined || a.status === filters.status)
    );

    const offset = (filters.page - 1) * filters.pageSize;

    return {
      appointments: matching.slice(offset, offset + filters.pageSize),
      total: matching.length,
    };
  }

  async hasCustomerConflict(customerId: number, dateTime: Date, excludeId?: number): Promise<boolean> {
    return this.findLiveAt("customer", customerId, dateTime, excludeId) !== undefined;
  }

  async hasDentistConflict(dentistId: number, dateTime: Date, excludeId?: number): Promise<boolean> {
    return this.findLiveAt("dentist", dentistId, dateTime, excludeId) !== undefined;
  }

  async update(appointment: Appointment): Promise<Appointment> {
    if (!this.appointments.has(appointment.id)) {
      throw new NotFoundError(`Appointment with ID ${appointment.id} not found`);
    }

    this.assertSlotsFree(appointment, appointment.id);

    const stored = cloneAppointment(appointment);
    this.appointments.set(stored.id, stored);

    return cloneAppointment(stored);
  }

  async delete(id: number): Promise<boolean> {
    return this.appointments.delete(id);
  }

  private select(predicate: (appointment: Appointment) => boolean): Appointment[] {
    return Array.from(this.appointments.values()).filter(predicate).sort(byDateTime).map(cloneAppointment);
  }

  private findLiveAt(owner: SlotOwner, ownerId: number, dateTime: Date, excludeId?: number): Appointment | undefined {
    const instant = dateTime.getTime();

    for (const appointment of this.appointments.values()) {
      const appointmentOwner = owner === "customer" ? appointment.customerId : appointment.dentistId;

      if (
        appointmentOwner === ownerId &&
        appointment.appointmentDateTime.getTime() === instant &&
        appointment.status !== AppointmentStatus.CANCELLED &&
        appointment.id !== excludeId
      ) {
        return appointment;
      }
    }

    return undefined;
  }

  private assertSlotsFree(
    appointment: Pick<Appointment, "customerId" | "dentistId" | "appointmentDateTime" | "status">,
    excludeId?: number
  ): void {
    if (appointment.status === AppointmentStatus.CANCELLED) {
      return;
    }

    if (this.findLiveAt("customer", appointment.customerId, appointment.appointmentDateTime, excludeId)) {
      throw new DuplicateSlotError("customer");
    }

    if (this.findLiveAt("dentist", appointment.dentistId, appointment.appointmentDateTime, excludeId)) {
      throw new DuplicateSlotError("dentist");
    }
  }
}
