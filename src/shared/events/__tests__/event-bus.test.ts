import { describe, expect, it, vi } from "vitest";
import { EventBus } from "../event-bus";
import { InProcessMessageBroker } from "../message-broker";

describe("InProcessMessageBroker", () => {
  it("delivers a JSON copy of each message to the channel's subscribers", async () => {
    const broker = new InProcessMessageBroker();
    const received: unknown[] = [];
    await broker.subscribe("a", (message) => {
      received.push(message);
    });

    await broker.publish("a", { at: new Date(Date.UTC(2030, 2, 4)), count: 1 });
    await broker.publish("b", { ignored: true });

    expect(received).toEqual([{ at: "2030-03-04T00:00:00.000Z", count: 1 }]);
    expect(broker.getPublished()).toHaveLength(2);
    expect(broker.getPublished("b")).toEqual([{ ignored: true }]);
  });

  it("keeps delivering when one subscriber throws", async () => {
    const broker = new InProcessMessageBroker();
    const healthy = vi.fn();
    await broker.subscribe("a", () => {
      throw new Error("subscriber failure");
    });
    await broker.subscribe("a", healthy);

    await expect(broker.publish("a", "hello")).resolves.toBeUndefined();
    expect(healthy).toHaveBeenCalledWith("hello");
  });
});

describe("EventBus", () => {
  it("builds events with an id and the given timestamp", () => {
    const bus = new EventBus(new InProcessMessageBroker(), "events");
    const event = bus.createEvent("dentistcreated", { dentistId: 3 }, new Date(Date.UTC(2030, 2, 1, 9)));

    expect(event).toEqual({
      eventType: "dentistcreated",
      eventId: expect.stringMatching(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/),
      timestamp: "2030-03-01T09:00:00.000Z",
      data: { dentistId: 3 },
    });
  });

  it("runs local handlers, emits, then publishes on its channel", async () => {
    const broker = new InProcessMessageBroker();
    const bus = new EventBus(broker, "events");
    const handle = vi.fn().mockResolvedValue(undefined);
    const failing = { handle: vi.fn().mockRejectedValue(new Error("handler failure")) };
    const listener = vi.fn();

    bus.registerHandler("ping", { handle });
    bus.registerHandler("ping", failing);
    bus.on("ping", listener);

    const event = bus.createEvent("ping", { n: 1 });
    await bus.publish(event);

    expect(handle).toHaveBeenCalledWith(event);
    expect(listener).toHaveBeenCalledWith(event);
    expect(broker.getPublished("events")).toEqual([JSON.parse(JSON.stringify(event))]);
  });

  it("stops calling an unregistered handler", async () => {
    const bus = new EventBus(new InProcessMessageBroker(), "events");
    const handler = { handle: vi.fn().mockResolvedValue(undefined) };

    bus.registerHandler("ping", handler);
    bus.unregisterHandler("ping", handler);
    await bus.publishLocal(bus.createEvent("ping", {}));

    expect(handler.handle).not.toHaveBeenCalled();
  });

  it("propagates a broker failure", async () => {
    const broker = new InProcessMessageBroker();
    vi.spyOn(broker, "publish").mockRejectedValue(new Error("broker down"));
    const bus = new EventBus(broker, "events");

    await expect(bus.publishDistributed(bus.createEvent("ping", {}))).rejects.toThrow("broker down");
  });
});
