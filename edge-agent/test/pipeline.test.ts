import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { BufferedForwarder } from "../src/forwarder.js";
import { AgentPipeline } from "../src/pipeline.js";
import type { SampleSource } from "../src/sampleSource.js";
import type { AgentRecord } from "../src/types.js";

const logger = pino({ level: "silent" });

function createSource(zs: number[]): SampleSource & { stopped: boolean } {
  let cursor = 0;
  return {
    stopped: false,
    async start() {},
    next(): AgentRecord {
      const z = zs[cursor % zs.length];
      cursor += 1;
      return {
        userId: 4,
        accelerometer: { x: 0, y: 0, z },
        gps: { latitude: 50, longitude: 30 },
        timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, cursor)),
      };
    },
    stop() {
      this.stopped = true;
    },
  };
}

describe("AgentPipeline", () => {
  it("labels each sample before enqueueing it", () => {
    const fetchImpl = vi.fn(async (..._args: Parameters<typeof fetch>) => new Response(null, { status: 201 }));
    const forwarder = new BufferedForwarder({ endpoint: "http://store.test", batchSize: 10, logger, fetchImpl });
    const pipeline = new AgentPipeline({ source: createSource([15000, 13000, 25000]), forwarder, logger, readIntervalMs: 1_000 });

    pipeline.tick();
    pipeline.tick();
    pipeline.tick();

    expect(forwarder.pending().map((record) => record.roadState)).toEqual(["normal", "small_pits", "large_pits"]);
    expect(pipeline.reads).toBe(3);
  });

  it("reads on an interval and closes the forwarder on stop", async () => {
    vi.useFakeTimers();
    try {
      const fetchImpl = vi.fn(async (..._args: Parameters<typeof fetch>) => new Response(null, { status: 201 }));
      const forwarder = new BufferedForwarder({ endpoint: "http://store.test", batchSize: 10, logger, fetchImpl });
      const source = createSource([15000]);
      const pipeline = new AgentPipeline({ source, forwarder, logger, readIntervalMs: 100 });

      await pipeline.start();
      await vi.advanceTimersByTimeAsync(350);
      const delivered = await pipeline.stop();

      expect(pipeline.reads).toBe(3);
      expect(delivered).toBe(true);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(source.stopped).toBe(true);
      expect(pipeline.tick()).toBe(false);
    }
    finally {
      vi.useRealTimers();
    }
  });
});
