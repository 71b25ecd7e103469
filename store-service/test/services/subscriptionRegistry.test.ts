import type { StoredRecord } from "@roadwatch/types";
import pino from "pino";
import { describe, expect, it } from "vitest";
import { SubscriptionRegistry } from "../../src/services/subscriptionRegistry.js";
import { FakeChannel } from "../testUtils/fakeChannel.js";

const logger = pino({ level: "silent" });

function stored(id: number, userId: number): StoredRecord {
  return {
    id,
    road_state: "normal",
    user_id: userId,
    x: 0,
    y: 0,
    z: 15000,
    latitude: 50,
    longitude: 30,
    timestamp: "2024-01-01T00:00:00.000Z",
  };
}

describe("SubscriptionRegistry", () => {
  it("delivers a record once to a subscriber of the same producer only", async () => {
    const registry = new SubscriptionRegistry(logger);
    const channel = new FakeChannel("a");
    registry.subscribe(5, channel);

    await expect(registry.notify(5, stored(1, 5))).resolves.toBe(1);
    await expect(registry.notify(6, stored(2, 6))).resolves.toBe(0);

    expect(channel.records()).toEqual([stored(1, 5)]);
  });

  it("keeps set semantics for repeated subscriptions", async () => {
    const registry = new SubscriptionRegistry(logger);
    const channel = new FakeChannel("a");
    registry.subscribe(5, channel);
    registry.subscribe(5, channel);

    await registry.notify(5, stored(1, 5));

    expect(registry.count(5)).toBe(1);
    expect(channel.received).toHaveLength(1);
  });

  it("fans out to every channel of the producer", async () => {
    const registry = new SubscriptionRegistry(logger);
    const a = new FakeChannel("a");
    const b = new FakeChannel("b");
    registry.subscribe(5, a);
    registry.subscribe(5, b);

    await expect(registry.notify(5, stored(1, 5))).resolves.toBe(2);

    expect(a.received).toEqual(b.received);
  });

  it("treats unsubscribe as idempotent", async () => {
    const registry = new SubscriptionRegistry(logger);
    const channel = new FakeChannel("a");
    registry.subscribe(5, channel);

    expect(registry.unsubscribe(5, channel)).toBe(true);
    expect(registry.unsubscribe(5, channel)).toBe(false);
    expect(registry.unsubscribe(42, channel)).toBe(false);
    await expect(registry.notify(5, stored(1, 5))).resolves.toBe(0);
    expect(registry.count()).toBe(0);
  });

  it("isolates a failed send and removes only that channel", async () => {
    const registry = new SubscriptionRegistry(logger);
    const broken = new FakeChannel("broken");
    broken.failWith = new Error("socket hang up");
    const healthy = new FakeChannel("healthy");
    registry.subscribe(5, broken);
    registry.subscribe(5, healthy);

    await expect(registry.notify(5, stored(1, 5))).resolves.toBe(1);
    await registry.notify(5, stored(2, 5));

    expect(healthy.records().map((record: StoredRecord) => record.id)).toEqual([1, 2]);
    expect(registry.count(5)).toBe(1);
    expect(broken.closedWith).toBe(1011);
  });

  it("drops a channel whose send does not finish in time", async () => {
    const registry = new SubscriptionRegistry(logger, { sendTimeoutMs: 10 });
    const stuck = new FakeChannel("stuck");
    stuck.hang = true;
    registry.subscribe(5, stuck);

    await expect(registry.notify(5, stored(1, 5))).resolves.toBe(0);
    expect(registry.count(5)).toBe(0);
  });

  it("tolerates a channel leaving during fan-out", async () => {
    const registry = new SubscriptionRegistry(logger);
    const leaving = new FakeChannel("leaving");
    const staying = new FakeChannel("staying");
    leaving.send = async (payload: string) => {
      registry.unsubscribe(5, leaving);
      leaving.received.push(payload);
    };
    registry.subscribe(5, leaving);
    registry.subscribe(5, staying);

    await expect(registry.notify(5, stored(1, 5))).resolves.toBe(2);
    expect(staying.received).toHaveLength(1);
    expect(registry.count(5)).toBe(1);
  });

  it("closes every channel on shutdown", () => {
    const registry = new SubscriptionRegistry(logger);
    const a = new FakeChannel("a");
    const b = new FakeChannel("b");
    registry.subscribe(1, a);
    registry.subscribe(2, b);

    registry.closeAll();

    expect(registry.count()).toBe(0);
    expect([a.closedWith, b.closedWith]).toEqual([1001, 1001]);
  });
});
