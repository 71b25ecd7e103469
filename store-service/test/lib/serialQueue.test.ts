import { describe, expect, it } from "vitest";
import { KeyedSerialQueue } from "../../src/lib/serialQueue.js";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedSerialQueue", () => {
  it("runs tasks under one key one after another", async () => {
    const queue = new KeyedSerialQueue<number>();
    const gate = deferred();
    const events: string[] = [];

    const first = queue.run(1, async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = queue.run(1, async () => {
      events.push("second");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("lets different keys run concurrently", async () => {
    const queue = new KeyedSerialQueue<number>();
    const gate = deferred();

    const blocked = queue.run(1, () => gate.promise);
    const other = await queue.run(2, async () => "done");

    expect(other).toBe("done");
    gate.resolve();
    await blocked;
  });

  it("keeps going after a failed task and forgets idle keys", async () => {
    const queue = new KeyedSerialQueue<string>();

    const failing = queue.run("a", async () => {
      throw new Error("boom");
    });
    const next = queue.run("a", async () => 42);

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
    await new Promise((resolve) => setImmediate(resolve));
    expect(queue.activeKeys).toBe(0);
  });
});
