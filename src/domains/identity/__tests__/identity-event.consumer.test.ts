import { beforeEach, describe, expect, it } from "vitest";
import { InProcessMessageBroker } from "@/shared/events/message-broker";
import { InMemoryCustomerRepository } from "@/domains/customers/repositories/in-memory-customer.repository";
import { InMemoryDentistRepository } from "@/domains/dentists/repositories/in-memory-dentist.repository";
import { UserCreatedHandler } from "../handlers/user-created.handler";
import { IdentityEventConsumer } from "../consumers/identity-event.consumer";
import { createClock, customerData, dentistData } from "@/__tests__/helpers/fixtures";

const CHANNEL = "test.user.created";

const userCreated = (data: Record<string, unknown>) => ({
  eventType: "UserCreated",
  eventId: "evt-1",
  timestamp: "2030-03-01T09:00:00.000Z",
  data: {
    userId: 501,
    email: "jane.doe@example.com",
    role: "Customer",
    entityType: "Customer",
    entityId: 1,
    ...data,
  },
});

describe("UserCreatedHandler and IdentityEventConsumer", () => {
  let customers: InMemoryCustomerRepository;
  let dentists: InMemoryDentistRepository;
  let broker: InProcessMessageBroker;
  let consumer: IdentityEventConsumer;

  beforeEach(async () => {
    const clock = createClock();
    customers = new InMemoryCustomerRepository(clock.now);
    dentists = new InMemoryDentistRepository(clock.now);
    broker = new InProcessMessageBroker();
    consumer = new IdentityEventConsumer(broker, new UserCreatedHandler(customers, dentists), CHANNEL);

    await customers.create(customerData());
    await dentists.create(dentistData());
  });

  it("links the customer named by id", async () => {
    expect(await consumer.onMessage(userCreated({}))).toBe(true);
    expect((await customers.findById(1))?.userId).toBe(501);
  });

  it("falls back to the email when the id is unknown", async () => {
    const handled = await consumer.onMessage(
      userCreated({ entityType: "dentist", entityId: 0, email: "helen.brooks@example.com", userId: "77" })
    );

    expect(handled).toBe(true);
    expect((await dentists.findById(1))?.userId).toBe(77);
  });

  it("rejects unknown entity types and unmatched entities", async () => {
    expect(await consumer.onMessage(userCreated({ entityType: "Admin" }))).toBe(false);
    expect(await consumer.onMessage(userCreated({ entityId: 40, email: "nobody@example.com" }))).toBe(false);
    expect((await customers.findById(1))?.userId).toBeNull();
  });

  it("drops malformed messages", async () => {
    expect(await consumer.onMessage({ eventType: "UserCreated", data: {} })).toBe(false);
    expect(await consumer.onMessage(userCreated({ email: "not-an-email" }))).toBe(false);
    expect(await consumer.onMessage("garbage")).toBe(false);
  });

  it("consumes events published on its channel while running", async () => {
    await consumer.start();
    await consumer.start();
    expect(consumer.isRunning).toBe(true);

    await broker.publish(CHANNEL, userCreated({}));
    expect((await customers.findById(1))?.userId).toBe(501);

    await consumer.stop();
    expect(consumer.isRunning).toBe(false);

    await broker.publish(CHANNEL, userCreated({ userId: 999 }));
    expect((await customers.findById(1))?.userId).toBe(501);
  });
});
