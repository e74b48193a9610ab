import { beforeEach, describe, expect, it } from "vitest";
import { NotFoundError } from "@/shared/types/common.types";
import { InMemoryAppointmentRepository } from "../repositories/in-memory-appointment.repository";
import { DuplicateSlotError } from "../repositories/appointment.repository";
import { AppointmentStatus, CreateAppointmentData } from "../models/appointment.model";
import { NOW, createClock, march } from "@/__tests__/helpers/fixtures";

const booking = (overrides: Partial<CreateAppointmentData> = {}): CreateAppointmentData => ({
  customerId: 1,
  dentistId: 1,
  appointmentDateTime: march(4, 10),
  procedureType: "Cleaning",
  notes: "",
  status: AppointmentStatus.SCHEDULED,
  ...overrides,
});

describe("InMemoryAppointmentRepository", () => {
  let repository: InMemoryAppointmentRepository;

  beforeEach(() => {
    repository = new InMemoryAppointmentRepository(createClock().now);
  });

  it("assigns ids and timestamps on create", async () => {
    const first = await repository.create(booking());
    const second = await repository.create(booking({ customerId: 2, dentistId: 2 }));

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first.createdAt).toEqual(NOW);
    expect(first.updatedAt).toEqual(NOW);
  });

  it("hands out copies that do not alias the stored record", async () => {
    const created = await repository.create(booking());
    created.status = AppointmentStatus.COMPLETED;
    created.appointmentDateTime.setUTCHours(15);

    const stored = await repository.findById(created.id);
    expect(stored?.status).toBe(AppointmentStatus.SCHEDULED);
    expect(stored?.appointmentDateTime).toEqual(march(4, 10));
  });

  it("refuses two live appointments for one customer or dentist at an instant", async () => {
    await repository.create(booking());

    await expect(repository.create(booking({ dentistId: 2 }))).rejects.toMatchObject({ owner: "customer" });
    await expect(repository.create(booking({ customerId: 2 }))).rejects.toMatchObject({ owner: "dentist" });
    await expect(
      repository.create(booking({ customerId: 2, status: AppointmentStatus.CANCELLED }))
    ).resolves.toMatchObject({ id: 2 });
  });

  it("applies the slot rule on update, excluding the record itself", async () => {
    const first = await repository.create(booking());
    const second = await repository.create(booking({ customerId: 2, appointmentDateTime: march(4, 11) }));

    await expect(repository.update({ ...first, notes: "updated" })).resolves.toMatchObject({ notes: "updated" });
    await expect(repository.update({ ...second, appointmentDateTime: march(4, 10) })).rejects.toBeInstanceOf(
      DuplicateSlotError
    );
    await expect(repository.update({ ...second, id: 99 })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("finds by owner and inclusive date range in chronological order", async () => {
    await repository.create(booking({ appointmentDateTime: march(5, 9) }));
    await repository.create(booking({ appointmentDateTime: march(4, 9) }));
    await repository.create(booking({ customerId: 2, dentistId: 2, appointmentDateTime: march(6, 9) }));

    expect((await repository.findByCustomerId(1)).map((a) => a.appointmentDateTime)).toEqual([march(4, 9), march(5, 9)]);
    expect((await repository.findByDentistId(2)).map((a) => a.id)).toEqual([3]);
    expect((await repository.findByDateRange(march(4, 9), march(5, 9))).map((a) => a.id)).toEqual([2, 1]);
  });

  it("filters and pages findAll", async () => {
    await repository.create(booking({ appointmentDateTime: march(4, 9) }));
    await repository.create(booking({ appointmentDateTime: march(4, 10), status: AppointmentStatus.COMPLETED }));
    await repository.create(booking({ appointmentDateTime: march(5, 10), dentistId: 2 }));

    const byDentist = await repository.findAll({ dentistId: 1, page: 1, pageSize: 10 });
    expect(byDentist.total).toBe(2);

    const byStatus = await repository.findAll({ status: AppointmentStatus.SCHEDULED, page: 1, pageSize: 10 });
    expect(byStatus.appointments.map((a) => a.id)).toEqual([1, 3]);

    const byRange = await repository.findAll({ startDate: march(4, 10), endDate: march(5, 23), page: 1, pageSize: 1 });
    expect(byRange.total).toBe(2);
    expect(byRange.appointments.map((a) => a.id)).toEqual([2]);
  });

  it("deletes by id", async () => {
    const created = await repository.create(booking());

    expect(await repository.delete(created.id)).toBe(true);
    expect(await repository.delete(created.id)).toBe(false);
    expect(await repository.hasCustomerConflict(1, march(4, 10))).toBe(false);
  });
});
