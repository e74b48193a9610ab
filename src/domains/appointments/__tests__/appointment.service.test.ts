import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConflictError } from "@/shared/types/common.types";
import { InMemoryCustomerRepository } from "@/domains/customers/repositories/in-memory-customer.repository";
import { InMemoryDentistRepository } from "@/domains/dentists/repositories/in-memory-dentist.repository";
import type { Customer } from "@/domains/customers/models/customer.model";
import type { Dentist } from "@/domains/dentists/models/dentist.model";
import { AppointmentRequest, AppointmentService } from "../services/appointment.service";
import { ConflictCheckerService } from "../services/conflict-checker.service";
import { InMemoryAppointmentRepository } from "../repositories/in-memory-appointment.repository";
import { AppointmentStatus } from "../models/appointment.model";
import {
  UTC_CALENDAR,
  createClock,
  createEmailServiceMock,
  customerData,
  dentistData,
  march,
  unwrap,
} from "@/__tests__/helpers/fixtures";

describe("AppointmentService", () => {
  let clock: ReturnType<typeof createClock>;
  let appointments: InMemoryAppointmentRepository;
  let customers: InMemoryCustomerRepository;
  let dentists: InMemoryDentistRepository;
  let email: ReturnType<typeof createEmailServiceMock>;
  let service: AppointmentService;
  let customer: Customer;
  let dentist: Dentist;

  const request = (overrides: Partial<AppointmentRequest> = {}): AppointmentRequest => ({
    customerId: customer.id,
    dentistId: dentist.id,
    appointmentDateTime: march(4, 10),
    procedureType: "Cleaning",
    notes: "",
    ...overrides,
  });

  beforeEach(async () => {
    clock = createClock();
    appointments = new InMemoryAppointmentRepository(clock.now);
    customers = new InMemoryCustomerRepository(clock.now);
    dentists = new InMemoryDentistRepository(clock.now);
    email = createEmailServiceMock();

    const checker = new ConflictCheckerService(appointments, UTC_CALENDAR, clock.now);
    service = new AppointmentService(appointments, customers, dentists, checker, email, clock.now);

    customer = await customers.create(customerData());
    dentist = await dentists.create(dentistData());
  });

  describe("createAppointment", () => {
    it("books a scheduled appointment and sends a confirmation", async () => {
      const result = await service.createAppointment(request({ procedureType: "  Cleaning  ", notes: "First visit" }));

      expect(result.success).toBe(true);
      expect(result.message).toBe("Appointment created successfully.");

      const appointment = unwrap(result);
      expect(appointment).toMatchObject({
        id: 1,
        customerId: customer.id,
        dentistId: dentist.id,
        appointmentDateTime: march(4, 10),
        procedureType: "Cleaning",
        notes: "First visit",
        status: AppointmentStatus.SCHEDULED,
      });
      expect(email.sendAppointmentConfirmation).toHaveBeenCalledWith(
        "jane.doe@example.com",
        "Jane Doe",
        "Helen Brooks",
        march(4, 10),
        "Cleaning"
      );
    });

    it("rejects non-positive ids and a blank procedure", async () => {
      expect(await service.createAppointment(request({ customerId: 0 }))).toEqual({
        success: false,
        code: "VALIDATION_ERROR",
        message: "Invalid customer or dentist ID.",
      });
      expect(await service.createAppointment(request({ dentistId: -3 }))).toEqual({
        success: false,
        code: "VALIDATION_ERROR",
        message: "Invalid customer or dentist ID.",
      });
      expect(await service.createAppointment(request({ procedureType: "   " }))).toEqual({
        success: false,
        code: "VALIDATION_ERROR",
        message: "Procedure type is required.",
      });
    });

    it("rejects a time the calendar does not allow", async () => {
      expect(await service.createAppointment(request({ appointmentDateTime: march(2, 10) }))).toEqual({
        success: false,
        code: "VALIDATION_ERROR",
        message: "Appointments cannot be scheduled on weekends.",
      });
      expect((await appointments.findAll({ page: 1, pageSize: 10 })).total).toBe(0);
      expect(email.sendAppointmentConfirmation).not.toHaveBeenCalled();
    });

    it("refuses an invalid date and stores nothing", async () => {
      const invalid = request({ appointmentDateTime: new Date("not a date") });

      const expected = { success: false, code: "VALIDATION_ERROR", message: "Invalid appointment date/time." };
      expect(await service.createAppointment(invalid)).toEqual(expected);
      expect(await service.createAppointment(invalid)).toEqual(expected);
      expect(await appointments.findByCustomerId(customer.id)).toEqual([]);
    });

    it("checks the date before looking up the customer", async () => {
      const result = await service.createAppointment(request({ customerId: 99, appointmentDateTime: march(1, 8) }));

      expect(result).toEqual({
        success: false,
        code: "VALIDATION_ERROR",
        message: "Cannot schedule appointments in the past.",
      });
    });

    it("requires an existing, active customer and dentist", async () => {
      const inactiveCustomer = await customers.create(customerData({ email: "gone@example.com", isActive: false }));
      const inactiveDentist = await dentists.create(dentistData({ email: "retired@example.com", isActive: false }));

      expect(await service.createAppointment(request({ customerId: 99 }))).toEqual({
        success: false,
        code: "REFERENCE_NOT_FOUND",
        message: "Customer not found.",
      });
      expect(await service.createAppointment(request({ customerId: inactiveCustomer.id }))).toEqual({
        success: false,
        code: "REFERENCE_NOT_FOUND",
        message: "Customer is not active.",
      });
      expect(await service.createAppointment(request({ dentistId: 99 }))).toEqual({
        success: false,
        code: "REFERENCE_NOT_FOUND",
        message: "Dentist not found.",
      });
      expect(await service.createAppointment(request({ dentistId: inactiveDentist.id }))).toEqual({
        success: false,
        code: "REFERENCE_NOT_FOUND",
        message: "Dentist is not active.",
      });
    });

    it("refuses a second appointment for the customer at the same instant", async () => {
      const otherDentist = await dentists.create(dentistData({ email: "adam.cole@example.com", name: "Adam Cole" }));
      unwrap(await service.createAppointment(request()));

      expect(await service.createAppointment(request({ dentistId: otherDentist.id }))).toEqual({
        success: false,
        code: "CONFLICT",
        message: "Customer already has an appointment at this time.",
      });
    });

    it("refuses a second appointment for the dentist at the same instant", async () => {
      const otherCustomer = await customers.create(customerData({ email: "john@example.com", name: "John Roe" }));
      unwrap(await service.createAppointment(request()));

      expect(await service.createAppointment(request({ customerId: otherCustomer.id }))).toEqual({
        success: false,
        code: "CONFLICT",
        message: "Dentist already has an appointment at this time.",
      });
    });

    it("allows re-booking a slot whose appointment was cancelled", async () => {
      const first = unwrap(await service.createAppointment(request()));
      unwrap(await service.cancelAppointment(first.id));

      const second = await service.createAppointment(request());

      expect(second.success).toBe(true);
      expect(unwrap(second).id).toBe(2);
    });

    it("reports a conflict when the store rejects a slot taken after the check", async () => {
      const otherCustomer = await customers.create(customerData({ email: "john@example.com", name: "John Roe" }));
      unwrap(await service.createAppointment(request()));
      vi.spyOn(appointments, "hasDentistConflict").mockResolvedValue(false);

      expect(await service.createAppointment(request({ customerId: otherCustomer.id }))).toEqual({
        success: false,
        code: "CONFLICT",
        message: "Dentist already has an appointment at this time.",
      });
    });

    it("still succeeds when the confirmation email fails", async () => {
      email.sendAppointmentConfirmation.mockRejectedValueOnce(new Error("smtp unavailable"));
      expect((await service.createAppointment(request())).success).toBe(true);

      email.sendAppointmentConfirmation.mockResolvedValueOnce(false);
      expect((await service.createAppointment(request({ appointmentDateTime: march(4, 11) }))).success).toBe(true);
    });
  });

  describe("updateAppointment", () => {
    it("rejects an invalid id and an unknown appointment", async () => {
      expect(await service.updateAppointment(0, request())).toEqual({
        success: false,
        code: "VALIDATION_ERROR",
        message: "Invalid appointment ID.",
      });
      expect(await service.updateAppointment(42, request())).toEqual({
        success: false,
        code: "NOT_FOUND",
        message: "Appointment not found.",
      });
    });

    it("updates details without re-validating an unchanged slot", async () => {
      const created = unwrap(await service.createAppointment(request()));
      clock.set(march(5, 9));

      const result = await service.updateAppointment(created.id, request({ notes: "Bring x-rays", procedureType: "Filling" }));

      expect(result.message).toBe("Appointment updated successfully.");
      expect(unwrap(result)).toMatchObject({
        id: created.id,
        notes: "Bring x-rays",
        procedureType: "Filling",
        appointmentDateTime: march(4, 10),
        updatedAt: march(5, 9),
      });
    });

    it("validates and conflict-checks a moved slot, ignoring the appointment itself", async () => {
      const otherCustomer = await customers.create(customerData({ email: "john@example.com", name: "John Roe" }));
      const created = unwrap(await service.createAppointment(request()));
      unwrap(await service.createAppointment(request({ customerId: otherCustomer.id, appointmentDateTime: march(4, 11) })));

      expect(await service.updateAppointment(created.id, request({ appointmentDateTime: march(3, 10) }))).toEqual({
        success: false,
        code: "VALIDATION_ERROR",
        message: "Appointments cannot be scheduled on weekends.",
      });
      expect(await service.updateAppointment(created.id, request({ appointmentDateTime: march(4, 11) }))).toEqual({
        success: false,
        code: "CONFLICT",
        message: "Dentist already has an appointment at this time.",
      });

      const moved = unwrap(await service.updateAppointment(created.id, request({ appointmentDateTime: march(4, 10, 30) })));
      expect(moved.appointmentDateTime).toEqual(march(4, 10, 30));
    });
  });

  describe("lifecycle", () => {
    it("lets the owning customer request cancellation of a scheduled appointment", async () => {
      const created = unwrap(await service.createAppointment(request()));

      expect(await service.requestAppointmentCancellation(created.id, customer.id + 1)).toEqual({
        success: false,
        code: "INVALID_STATE",
        message: "You can only cancel your own appointments.",
      });

      const requested = await service.requestAppointmentCancellation(created.id, customer.id);
      expect(requested.message).toBe("Cancellation request submitted successfully.");
      expect(unwrap(requested).status).toBe(AppointmentStatus.CANCELLATION_REQUESTED);

      expect(await service.requestAppointmentCancellation(created.id, customer.id)).toEqual({
        success: false,
        code: "INVALID_STATE",
        message: "Only scheduled appointments can be cancelled.",
      });
    });

    it("cancels a requested cancellation and notifies the customer", async () => {
      const created = unwrap(await service.createAppointment(request()));
      unwrap(await service.requestAppointmentCancellation(created.id, customer.id));

      const cancelled = await service.cancelAppointment(created.id);

      expect(cancelled.message).toBe("Appointment cancelled successfully.");
      expect(unwrap(cancelled).status).toBe(AppointmentStatus.CANCELLED);
      expect(email.sendAppointmentCancellation).toHaveBeenCalledWith(
        "jane.doe@example.com",
        "Jane Doe",
        march(4, 10),
        "Cleaning"
      );
    });

    it("completes scheduled appointments only", async () => {
      const created = unwrap(await service.createAppointment(request()));

      const completed = await service.completeAppointment(created.id);
      expect(completed.message).toBe("Appointment marked as completed.");
      expect(unwrap(completed).status).toBe(AppointmentStatus.COMPLETED);

      expect(await service.completeAppointment(created.id)).toEqual({
        success: false,
        code: "INVALID_STATE",
        message: "Only scheduled appointments can be completed.",
      });
      expect(await service.cancelAppointment(created.id)).toEqual({
        success: false,
        code: "INVALID_STATE",
        message: "Cannot cancel completed appointments.",
      });
    });

    it("reports unknown appointments as not found", async () => {
      const notFound = { success: false, code: "NOT_FOUND", message: "Appointment not found." };

      expect(await service.cancelAppointment(7)).toEqual(notFound);
      expect(await service.completeAppointment(7)).toEqual(notFound);
      expect(await service.requestAppointmentCancellation(7, customer.id)).toEqual(notFound);
    });

    it("keeps the cancellation when the notification email throws", async () => {
      const created = unwrap(await service.createAppointment(request()));
      email.sendAppointmentCancellation.mockRejectedValueOnce(new Error("smtp unavailable"));

      const cancelled = await service.cancelAppointment(created.id);

      expect(cancelled.success).toBe(true);
      expect((await appointments.findById(created.id))?.status).toBe(AppointmentStatus.CANCELLED);
    });
  });

  describe("updateAppointmentStatus", () => {
    it("returns null for an unknown appointment", async () => {
      expect(await service.updateAppointmentStatus(5, AppointmentStatus.COMPLETED, "")).toBeNull();
    });

    it("writes the given status even outside the lifecycle", async () => {
      const created = unwrap(await service.createAppointment(request()));
      unwrap(await service.completeAppointment(created.id));

      const reopened = await service.updateAppointmentStatus(created.id, AppointmentStatus.SCHEDULED, "Entered by mistake");

      expect(reopened?.status).toBe(AppointmentStatus.SCHEDULED);
      expect((await appointments.findById(created.id))?.status).toBe(AppointmentStatus.SCHEDULED);
    });

    it("throws a conflict when reinstating a cancelled appointment whose slot was re-booked", async () => {
      const first = unwrap(await service.createAppointment(request()));
      unwrap(await service.cancelAppointment(first.id));
      unwrap(await service.createAppointment(request()));

      const reinstate = service.updateAppointmentStatus(first.id, AppointmentStatus.SCHEDULED, "");

      await expect(reinstate).rejects.toBeInstanceOf(ConflictError);
      await expect(reinstate).rejects.toThrow("Customer already has an appointment at this time.");
    });
  });

  describe("queries", () => {
    it("filters and paginates appointments", async () => {
      const otherCustomer = await customers.create(customerData({ email: "john@example.com", name: "John Roe" }));
      unwrap(await service.createAppointment(request({ appointmentDateTime: march(4, 9) })));
      unwrap(await service.createAppointment(request({ appointmentDateTime: march(4, 10) })));
      const third = unwrap(
        await service.createAppointment(request({ customerId: otherCustomer.id, appointmentDateTime: march(5, 10) }))
      );
      unwrap(await service.completeAppointment(third.id));

      const page = await service.getAppointments({ customerId: customer.id, page: 2, pageSize: 1 });
      expect(page.total).toBe(2);
      expect(page.appointments.map((a) => a.appointmentDateTime)).toEqual([march(4, 10)]);

      const completed = await service.getAppointments({ status: AppointmentStatus.COMPLETED, page: 1, pageSize: 10 });
      expect(completed.appointments.map((a) => a.id)).toEqual([third.id]);

      expect((await service.getAppointmentsByCustomer(otherCustomer.id)).map((a) => a.id)).toEqual([third.id]);
      expect(await service.getAppointmentsByDentist(dentist.id)).toHaveLength(3);
      expect(await service.getAppointmentById(third.id)).toMatchObject({ status: AppointmentStatus.COMPLETED });
    });

    it("deletes an appointment once", async () => {
      const created = unwrap(await service.createAppointment(request()));

      expect(await service.deleteAppointment(created.id)).toBe(true);
      expect(await service.deleteAppointment(created.id)).toBe(false);
      expect(await service.getAppointmentById(created.id)).toBeNull();
    });
  });

  describe("availability", () => {
    it("lists a dentist's free slots with the dentist's name", async () => {
      unwrap(await service.createAppointment(request({ appointmentDateTime: march(4, 8) })));

      const result = await service.getAvailableSlots(dentist.id, march(4, 0), march(4, 23));
      const slots = unwrap(result);

      expect(result.message).toBe("Available slots retrieved successfully.");
      expect(slots).toHaveLength(19);
      expect(slots[0]).toEqual({
        dentistId: dentist.id,
        dentistName: "Helen Brooks",
        dateTime: march(4, 8, 30),
        durationMinutes: 30,
        isAvailable: true,
      });
    });

    it("reports an unknown dentist", async () => {
      expect(await service.getAvailableSlots(99, march(4, 0), march(4, 23))).toEqual({
        success: false,
        code: "NOT_FOUND",
        message: "Dentist not found.",
      });
    });

    it("lists slots of every active dentist ordered by name", async () => {
      await dentists.create(dentistData({ email: "adam.cole@example.com", name: "Adam Cole" }));
      await dentists.create(dentistData({ email: "retired@example.com", name: "Aaron Old", isActive: false }));

      const slots = await service.getAllAvailableSlots(march(4, 0), march(4, 23));

      expect(slots).toHaveLength(40);
      expect(slots[0]?.dentistName).toBe("Adam Cole");
      expect(slots[20]?.dentistName).toBe("Helen Brooks");
    });

    it("answers whether a single slot is free", async () => {
      unwrap(await service.createAppointment(request()));

      expect(await service.isSlotAvailable(dentist.id, march(4, 10))).toBe(false);
      expect(await service.isSlotAvailable(dentist.id, march(4, 10, 30))).toBe(true);
    });
  });
});
