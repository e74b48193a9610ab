import { createModuleLogger } from "@/shared/config/logger";
import { ConflictError, fail, OperationResult, succeed } from "@/shared/types/common.types";
import type { CustomerRepository } from "@/domains/customers/repositories/customer.repository";
import type { Dentist } from "@/domains/dentists/models/dentist.model";
import type { DentistRepository } from "@/domains/dentists/repositories/dentist.repository";
import type { EmailService } from "@/domains/notifications/services/email.service";
import {
  Appointment,
  AppointmentAction,
  AppointmentFilters,
  AppointmentPage,
  AppointmentStatus,
  APPOINTMENT_TRANSITIONS,
  AvailableSlot,
  isKnownTransition,
} from "../models/appointment.model";
import { AppointmentRepository, DuplicateSlotError, SlotOwner } from "../repositories/appointment.repository";
import type { Clock, ConflictCheckerService } from "./conflict-checker.service";

const moduleLogger = createModuleLogger("AppointmentService");

export interface AppointmentRequest {
  customerId: number;
  dentistId: number;
  appointmentDateTime: Date;
  procedureType: string;
  notes: string;
}

const CONFLICT_MESSAGES: Record<SlotOwner, string> = {
  customer: "Customer already has an appointment at this time.",
  dentist: "Dentist already has an appointment at this time.",
};

const APPOINTMENT_NOT_FOUND = "Appointment not found.";

export class AppointmentService {
  constructor(
    private readonly appointmentRepository: AppointmentRepository,
    private readonly customerRepository: CustomerRepository,
    private readonly dentistRepository: DentistRepository,
    private readonly conflictChecker: ConflictCheckerService,
    private readonly emailService: EmailService,
    private readonly now: Clock = () => new Date()
  ) {}

  async createAppointment(request: AppointmentRequest): Promise<OperationResult<Appointment>> {
    const invalid = this.validateRequest(request);
    if (invalid) {
      return invalid;
    }

    const dateValidation = this.conflictChecker.validateDateTime(request.appointmentDateTime);
    if (!dateValidation.isValid) {
      return fail("VALIDATION_ERROR", dateValidation.message);
    }

    const customer = await this.customerRepository.findById(request.customerId);
    if (!customer) {
      return fail("REFERENCE_NOT_FOUND", "Customer not found.");
    }
    if (!customer.isActive) {
      return fail("REFERENCE_NOT_FOUND", "Customer is not active.");
    }

    const dentist = await this.dentistRepository.findById(request.dentistId);
    if (!dentist) {
      return fail("REFERENCE_NOT_FOUND", "Dentist not found.");
    }
    if (!dentist.isActive) {
      return fail("REFERENCE_NOT_FOUND", "Dentist is not active.");
    }

    const conflict = await this.findConflict(request);
    if (conflict) {
      return conflict;
    }

    let appointment: Appointment;
    try {
      appointment = await this.appointmentRepository.create({
        customerId: request.customerId,
        dentistId: request.dentistId,
        appointmentDateTime: request.appointmentDateTime,
        procedureType: request.procedureType.trim(),
        notes: request.notes,
        status: AppointmentStatus.SCHEDULED,
      });
    } catch (error) {
      if (error instanceof DuplicateSlotError) {
        return fail("CONFLICT", CONFLICT_MESSAGES[error.owner]);
      }
      throw error;
    }

    await this.notify("appointment confirmation", appointment.id, () =>
      this.emailService.sendAppointmentConfirmation(
        customer.email,
        customer.name,
        dentist.name,
        appointment.appointmentDateTime,
        appointment.procedureType
      )
    );

    moduleLogger.info(
      { appointmentId: appointment.id, customerId: appointment.customerId, dentistId: appointment.dentistId },
      "Appointment created successfully"
    );

    return succeed("Appointment created successfully.", appointment);
  }

  async updateAppointment(id: number, request: AppointmentRequest): Promise<OperationResult<Appointment>> {
    if (id <= 0) {
      return fail("VALIDATION_ERROR", "Invalid appointment ID.");
    }

    const invalid = this.validateRequest(request);
    if (invalid) {
      return invalid;
    }

    const appointment = await this.appointmentRepository.findById(id);
    if (!appointment) {
      return fail("NOT_FOUND", APPOINTMENT_NOT_FOUND);
    }

    // Date rules and conflicts are only re-checked when the slot moves
    if (appointment.appointmentDateTime.getTime() !== request.appointmentDateTime.getTime()) {
      const dateValidation = this.conflictChecker.validateDateTime(request.appointmentDateTime);
      if (!dateValidation.isValid) {
        return fail("VALIDATION_ERROR", dateValidation.message);
      }

      const conflict = await this.findConflict(request, id);
      if (conflict) {
        return conflict;
      }
    }

    const updated: Appointment = {
      ...appointment,
      customerId: request.customerId,
      dentistId: request.dentistId,
      appointmentDateTime: request.appointmentDateTime,
      procedureType: request.procedureType.trim(),
      notes: request.notes,
      updatedAt: this.now(),
    };

    try {
      const saved = await this.appointmentRepository.update(updated);
      moduleLogger.info({ appointmentId: id }, "Appointment updated successfully");
      return succeed("Appointment updated successfully.", saved);
    } catch (error) {
      if (error instanceof DuplicateSlotError) {
        return fail("CONFLICT", CONFLICT_MESSAGES[error.owner]);
      }
      throw error;
    }
  }

  /**
   * Administrative override: the status is written as given. Moves that the lifecycle
   * table would not allow are logged but not refused.
   */
  async updateAppointmentStatus(id: number, status: AppointmentStatus, reason: string): Promise<Appointment | null> {
    const appointment = await this.appointmentRepository.findById(id);
    if (!appointment) {
      return null;
    }

    if (!isKnownTransition(appointment.status, status)) {
      moduleLogger.warn(
        { appointmentId: id, from: appointment.status, to: status, reason },
        "Appointment status overridden outside the lifecycle"
      );
    }

    try {
      const saved = await this.appointmentRepository.update({ ...appointment, status, updatedAt: this.now() });
      moduleLogger.info({ appointmentId: id, status, reason }, "Appointment status updated");
      return saved;
    } catch (error) {
      if (error instanceof DuplicateSlotError) {
        throw new ConflictError(CONFLICT_MESSAGES[error.owner]);
      }
      throw error;
    }
  }

  async requestAppointmentCancellation(id: number, requestingCustomerId: number): Promise<OperationResult<Appointment>> {
    const appointment = await this.appointmentRepository.findById(id);
    if (!appointment) {
      return fail("NOT_FOUND", APPOINTMENT_NOT_FOUND);
    }

    if (appointment.customerId !== requestingCustomerId) {
      return fail("INVALID_STATE", "You can only cancel your own appointments.");
    }

    const result = await this.applyTransition(appointment, "requestCancellation");
    if (!result.success) {
      return result;
    }

    return succeed("Cancellation request submitted successfully.", result.data);
  }

  async cancelAppointment(id: number): Promise<OperationResult<Appointment>> {
    const appointment = await this.appointmentRepository.findById(id);
    if (!appointment) {
      return fail("NOT_FOUND", APPOINTMENT_NOT_FOUND);
    }

    const result = await this.applyTransition(appointment, "cancel");
    if (!result.success) {
      return result;
    }

    const cancelled = result.data;
    const customer = await this.customerRepository.findById(cancelled.customerId);
    if (customer) {
      await this.notify("appointment cancellation", cancelled.id, () =>
        this.emailService.sendAppointmentCancellation(
          customer.email,
          customer.name,
          cancelled.appointmentDateTime,
          cancelled.procedureType
        )
      );
    }

    return succeed("Appointment cancelled successfully.", cancelled);
  }

  async completeAppointment(id: number): Promise<OperationResult<Appointment>> {
    const appointment = await this.appointmentRepository.findById(id);
    if (!appointment) {
      return fail("NOT_FOUND", APPOINTMENT_NOT_FOUND);
    }

    const result = await this.applyTransition(appointment, "complete");
    if (!result.success) {
      return result;
    }

    return succeed("Appointment marked as completed.", result.data);
  }

  async deleteAppointment(id: number): Promise<boolean> {
    const deleted = await this.appointmentRepository.delete(id);
    if (deleted) {
      moduleLogger.info({ appointmentId: id }, "Appointment deleted");
    }
    return deleted;
  }

  async getAppointments(filters: AppointmentFilters): Promise<AppointmentPage> {
    return this.appointmentRepository.findAll(filters);
  }

  async getAppointmentById(id: number): Promise<Appointment | null> {
    return this.appointmentRepository.findById(id);
  }

  async getAppointmentsByCustomer(customerId: number): Promise<Appointment[]> {
    return this.appointmentRepository.findByCustomerId(customerId);
  }

  async getAppointmentsByDentist(dentistId: number): Promise<Appointment[]> {
    return this.appointmentRepository.findByDentistId(dentistId);
  }

  async getAvailableSlots(dentistId: number, startDate: Date, endDate: Date): Promise<OperationResult<AvailableSlot[]>> {
    const dentist = await this.dentistRepository.findById(dentistId);
    if (!dentist) {
      return fail("NOT_FOUND", "Dentist not found.");
    }

    return succeed("Available slots retrieved successfully.", await this.slotsFor(dentist, startDate, endDate));
  }

  async getAllAvailableSlots(startDate: Date, endDate: Date): Promise<AvailableSlot[]> {
    const dentists = await this.dentistRepository.findActive();
    const slots: AvailableSlot[] = [];

    for (const dentist of dentists) {
      slots.push(...(await this.slotsFor(dentist, startDate, endDate)));
    }

    return slots;
  }

  async isSlotAvailable(dentistId: number, dateTime: Date): Promise<boolean> {
    return this.conflictChecker.isSlotAvailable(dentistId, dateTime);
  }

  private validateRequest(request: AppointmentRequest): OperationResult<Appointment> | null {
    if (request.customerId <= 0 || request.dentistId <= 0) {
      return fail("VALIDATION_ERROR", "Invalid customer or dentist ID.");
    }
    if (request.procedureType.trim() === "") {
      return fail("VALIDATION_ERROR", "Procedure type is required.");
    }
    return null;
  }

  private async findConflict(
    request: AppointmentRequest,
    excludeId?: number
  ): Promise<OperationResult<Appointment> | null> {
    if (await this.conflictChecker.hasCustomerConflict(request.customerId, request.appointmentDateTime, excludeId)) {
      return fail("CONFLICT", CONFLICT_MESSAGES.customer);
    }
    if (await this.conflictChecker.hasDentistConflict(request.dentistId, request.appointmentDateTime, excludeId)) {
      return fail("CONFLICT", CONFLICT_MESSAGES.dentist);
    }
    return null;
  }

  private async applyTransition(
    appointment: Appointment,
    action: AppointmentAction
  ): Promise<OperationResult<Appointment>> {
    const transition = APPOINTMENT_TRANSITIONS[action];
    if (!transition.canApply(appointment.status)) {
      return fail("INVALID_STATE", transition.rejection);
    }

    try {
      const saved = await this.appointmentRepository.update({
        ...appointment,
        status: transition.to,
        updatedAt: this.now(),
      });

      moduleLogger.info(
        { appointmentId: appointment.id, from: appointment.status, to: transition.to },
        "Appointment status changed"
      );

      return succeed("", saved);
    } catch (error) {
      if (error instanceof DuplicateSlotError) {
        return fail("CONFLICT", CONFLICT_MESSAGES[error.owner]);
      }
      throw error;
    }
  }

  private async slotsFor(dentist: Dentist, startDate: Date, endDate: Date): Promise<AvailableSlot[]> {
    const slots = await this.conflictChecker.findAvailableSlots(dentist.id, startDate, endDate);

    return slots.map((dateTime) => ({
      dentistId: dentist.id,
      dentistName: dentist.name,
      dateTime,
      durationMinutes: this.conflictChecker.slotMinutes,
      isAvailable: true,
    }));
  }

  // Mail is advisory: a failed or throwing send never fails the operation
  private async notify(kind: string, appointmentId: number, send: () => Promise<boolean>): Promise<void> {
    try {
      const sent = await send();
      if (!sent) {
        moduleLogger.warn({ appointmentId }, `Failed to send ${kind} email`);
      }
    } catch (error) {
      moduleLogger.warn({ err: error, appointmentId }, `Failed to send ${kind} email`);
    }
  }
}
