import type { Logger } from "pino";
import { processAgentRecord } from "./classifier.js";
import type { BufferedForwarder } from "./forwarder.js";
import type { SampleSource } from "./sampleSource.js";

export type AgentPipelineOptions = {
  source: SampleSource;
  forwarder: BufferedForwarder;
  logger: Logger;
  readIntervalMs: number;
};

/** Reads one sample per tick, labels it and hands it to the forwarder. */
export class AgentPipeline {
  private timer: NodeJS.Timeout | null = null;
  private readCount = 0;

  constructor(private readonly options: AgentPipelineOptions) {}

  async start(): Promise<void> {
    if (this.timer) return;
    await this.options.source.start();
    this.timer = setInterval(() => this.tick(), this.options.readIntervalMs);
    this.options.logger.info({ readIntervalMs: this.options.readIntervalMs }, "Agent pipeline started");
  }

  tick(): boolean {
    const record = this.options.source.next();
    const processed = processAgentRecord(record);
    this.readCount += 1;
    const accepted = this.options.forwarder.enqueue(processed);
    if (!accepted) {
      this.options.logger.warn({ userId: record.userId }, "Forwarder closed, sample not enqueued");
    }
    return accepted;
  }

  get reads(): number {
    return this.readCount;
  }

  async stop(): Promise<boolean> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.options.source.stop();
    const delivered = await this.options.forwarder.close();
    this.options.logger.info({ reads: this.readCount, ...this.options.forwarder.stats() }, "Agent pipeline stopped");
    return delivered;
  }
}
