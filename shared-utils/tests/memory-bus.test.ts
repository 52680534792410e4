import { describe, expect, it } from "vitest";
import {
  BusEvent,
  createBus,
  isBusEvent,
  MemoryBus,
  SimulationRequestedEvent,
} from "../src/bus";
import { silentLogger } from "../src/logger";

const request = (id: string): SimulationRequestedEvent => ({
  type: "simulation_requested",
  id,
  timestamp: "2024-01-01T00:00:00.000Z",
  data: { marketId: "market-1" },
});

describe("MemoryBus", () => {
  it("should deliver events only to handlers of their topic", async () => {
    const bus = new MemoryBus("test", silentLogger);
    const requested: string[] = [];
    const failed: string[] = [];

    await bus.subscribe("simulation_requested", async (event) => {
      requested.push(event.data.marketId);
    });
    await bus.subscribe("simulation_failed", async (event) => {
      failed.push(event.data.kind);
    });

    await bus.publish(request("a"));

    expect(requested).toEqual(["market-1"]);
    expect(failed).toEqual([]);
  });

  it("should keep delivering when one handler throws", async () => {
    const bus = new MemoryBus("test", silentLogger);
    const seen: string[] = [];

    await bus.subscribe("simulation_requested", async () => {
      throw new Error("boom");
    });
    await bus.subscribe("simulation_requested", async (event) => {
      seen.push(event.id);
    });

    await expect(bus.publish(request("a"))).resolves.toBeUndefined();
    expect(seen).toEqual(["a"]);
  });

  it("should record history and report status", async () => {
    const bus = new MemoryBus("test", silentLogger);
    await bus.subscribe("simulation_requested", async () => undefined);
    await bus.publish(request("a"));
    await bus.publish(request("b"));

    expect(bus.getPublishedEvents().map((event) => event.id)).toEqual(["a", "b"]);
    expect(bus.getStatus()).toEqual({
      service: "test",
      subscribedTopics: ["simulation_requested"],
      handlerCount: 1,
      publishedEventCount: 2,
    });

    bus.clearHistory();
    expect(bus.getPublishedEvents()).toEqual([]);

    await bus.close();
    expect(bus.getStatus().handlerCount).toBe(0);
  });
});

describe("createBus", () => {
  it("should build a memory bus", () => {
    const bus = createBus({ type: "memory", serviceName: "test" }, silentLogger);
    expect(bus).toBeInstanceOf(MemoryBus);
  });

  it("should require a URL for the redis bus", () => {
    expect(() => createBus({ type: "redis", serviceName: "test" }, silentLogger)).toThrow(
      "Redis URL is required for Redis bus"
    );
  });
});

describe("isBusEvent", () => {
  it("should accept a well-formed event", () => {
    const event: unknown = JSON.parse(JSON.stringify(request("a")));
    expect(isBusEvent(event)).toBe(true);
  });

  it.each<[string, unknown]>([
    ["null", null],
    ["unknown type", { ...request("a"), type: "listing_changed" }],
    ["numeric id", { ...request("a"), id: 7 }],
    ["missing data", { type: "simulation_failed", id: "a", timestamp: "t" }],
    ["missing marketId", { ...request("a"), data: {} }],
    ["numeric marketId", { ...request("a"), data: { marketId: 7 } }],
  ])("should reject %s", (_label, value) => {
    expect(isBusEvent(value)).toBe(false);
  });

  it("should narrow to the published union", () => {
    const events: BusEvent[] = [request("a")];
    expect(events.every(isBusEvent)).toBe(true);
  });
});
