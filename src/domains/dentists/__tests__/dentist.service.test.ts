import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConflictError, NotFoundError } from "@/shared/types/common.types";
import { EventBus } from "@/shared/events/event-bus";
import { EventTypes } from "@/shared/events/event.types";
import { InProcessMessageBroker } from "@/shared/events/message-broker";
import { DentistService } from "../services/dentist.service";
import { InMemoryDentistRepository } from "../repositories/in-memory-dentist.repository";
import type { DentistInput } from "../models/dentist.model";
import { NOW, createClock, dentistData, march } from "@/__tests__/helpers/fixtures";

const CHANNEL = "test.events";

const input = (overrides: Partial<DentistInput> = {}): DentistInput => ({
  name: " Helen Brooks ",
  email: "helen.brooks@example.com",
  phone: "555-0200",
  licenseNumber: "DDS-1001",
  specialization: "Orthodontics",
  ...overrides,
});

describe("DentistService", () => {
  let clock: ReturnType<typeof createClock>;
  let repository: InMemoryDentistRepository;
  let broker: InProcessMessageBroker;
  let eventBus: EventBus;
  let service: DentistService;

  beforeEach(() => {
    clock = createClock();
    repository = new InMemoryDentistRepository(clock.now);
    broker = new InProcessMessageBroker();
    eventBus = new EventBus(broker, CHANNEL);
    service = new DentistService(repository, eventBus, clock.now);
  });

  it("creates an active dentist with trimmed fields", async () => {
    const dentist = await service.createDentist(input({ isActive: false }));

    expect(dentist).toMatchObject({
      id: 1,
      name: "Helen Brooks",
      licenseNumber: "DDS-1001",
      userId: null,
      isActive: true,
      createdAt: NOW,
    });
  });

  it("refuses a duplicate email", async () => {
    await repository.create(dentistData());

    await expect(service.createDentist(input())).rejects.toThrow(
      new ConflictError("A dentist with email 'helen.brooks@example.com' already exists.")
    );
  });

  it("announces a dentist created with auth on the events channel", async () => {
    const localListener = vi.fn();
    eventBus.on(EventTypes.DENTIST_CREATED, localListener);

    const dentist = await service.createDentistWithAuth(input());

    expect(broker.getPublished(CHANNEL)).toEqual([
      {
        eventType: "dentistcreated",
        eventId: expect.stringMatching(/^[0-9a-f-]{36}$/),
        timestamp: NOW.toISOString(),
        data: {
          dentistId: dentist.id,
          name: "Helen Brooks",
          email: "helen.brooks@example.com",
          licenseNumber: "DDS-1001",
          specialization: "Orthodontics",
        },
      },
    ]);
    expect(localListener).toHaveBeenCalledTimes(1);
  });

  it("does not publish when creation fails", async () => {
    await repository.create(dentistData());

    await expect(service.createDentistWithAuth(input())).rejects.toBeInstanceOf(ConflictError);
    expect(broker.getPublished()).toEqual([]);
  });

  describe("updateDentist", () => {
    it("updates fields and keeps the active flag unless given", async () => {
      const existing = await repository.create(dentistData({ isActive: false }));
      clock.set(march(4, 9));

      const updated = await service.updateDentist(existing.id, input({ specialization: "Endodontics" }));

      expect(updated).toMatchObject({ specialization: "Endodontics", isActive: false, updatedAt: march(4, 9) });
    });

    it("throws for an unknown dentist or a taken email", async () => {
      await repository.create(dentistData({ email: "taken@example.com" }));
      const other = await repository.create(dentistData());

      await expect(service.updateDentist(9, input())).rejects.toThrow(new NotFoundError("Dentist with ID 9 not found."));
      await expect(service.updateDentist(other.id, input({ email: "taken@example.com" }))).rejects.toBeInstanceOf(
        ConflictError
      );
    });
  });

  it("lists dentists and active dentists by name", async () => {
    await repository.create(dentistData({ name: "Zed Young", email: "zed@example.com" }));
    await repository.create(dentistData({ name: "Amy Ash", email: "amy@example.com", isActive: false }));
    await repository.create(dentistData({ name: "Bea Bell", email: "bea@example.com" }));

    expect((await service.getDentists(1, 2)).dentists.map((d) => d.name)).toEqual(["Amy Ash", "Bea Bell"]);
    expect((await service.getActiveDentists()).map((d) => d.name)).toEqual(["Bea Bell", "Zed Young"]);
    expect((await service.getDentistByEmail("BEA@example.com"))?.name).toBe("Bea Bell");
    expect(await service.deleteDentist(1)).toBe(true);
    expect(await service.getDentistById(1)).toBeNull();
  });
});
