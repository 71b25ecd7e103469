import type { StoredRecord } from "@roadwatch/types";
import type { ServiceLogger } from "../logger.js";

/** One live subscriber connection. `send` rejects when the peer is gone. */
export interface SubscriberChannel {
  readonly id: string;
  send(payload: string): Promise<void>;
  close?(code?: number, reason?: string): void;
}

export type SubscriptionRegistryOptions = {
  sendTimeoutMs?: number;
};

export class SendTimeoutError extends Error {
  constructor(readonly channelId: string, readonly timeoutMs: number) {
    super(`send to ${channelId} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, SendTimeoutError.prototype);
  }
}

function withTimeout(channel: SubscriberChannel, payload: string, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new SendTimeoutError(channel.id, timeoutMs)), timeoutMs);
  });
  // send may throw synchronously; Promise.resolve().then turns that into a rejection
  const send = Promise.resolve().then(() => channel.send(payload));
  return Promise.race([send, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Live channels per producer (user id).
 *
 * Mutations are synchronous and `notify` iterates a snapshot, so a channel that
 * disconnects mid fan-out cannot disturb delivery to the others.
 */
export class SubscriptionRegistry {
  private readonly channels = new Map<number, Set<SubscriberChannel>>();
  private readonly sendTimeoutMs: number;

  constructor(
    private readonly logger: ServiceLogger,
    options: SubscriptionRegistryOptions = {}
  ) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? 5_000;
  }

  subscribe(userId: number, channel: SubscriberChannel): void {
    let set = this.channels.get(userId);
    if (!set) {
      set = new Set();
      this.channels.set(userId, set);
    }
    set.add(channel);
    this.logger.info({ userId, channelId: channel.id, subscribers: set.size }, "subscriber connected");
  }

  /** Returns false when the channel was not registered; never throws. */
  unsubscribe(userId: number, channel: SubscriberChannel): boolean {
    const set = this.channels.get(userId);
    if (!set || !set.delete(channel)) return false;
    if (set.size === 0) this.channels.delete(userId);
    this.logger.info({ userId, channelId: channel.id, subscribers: set.size }, "subscriber disconnected");
    return true;
  }

  /** Sends the record to every channel of the user; resolves with the number of successful sends. */
  async notify(userId: number, record: StoredRecord): Promise<number> {
    const set = this.channels.get(userId);
    if (!set || set.size === 0) return 0;

    const targets = [...set];
    const payload = JSON.stringify(record);
    const results = await Promise.allSettled(
      targets.map((channel) => withTimeout(channel, payload, this.sendTimeoutMs))
    );

    let delivered = 0;
    results.forEach((result, idx) => {
      if (result.status === "fulfilled") {
        delivered += 1;
        return;
      }
      const channel = targets[idx];
      this.logger.warn({ err: result.reason, userId, channelId: channel.id, recordId: record.id }, "dropping subscriber after failed send");
      this.unsubscribe(userId, channel);
      channel.close?.(1011, "delivery failed");
    });
    return delivered;
  }

  count(userId?: number): number {
    if (userId !== undefined) return this.channels.get(userId)?.size ?? 0;
    let total = 0;
    for (const set of this.channels.values()) total += set.size;
    return total;
  }

  closeAll(): void {
    for (const [userId, set] of [...this.channels.entries()]) {
      for (const channel of [...set]) {
        this.unsubscribe(userId, channel);
        channel.close?.(1001, "server shutting down");
      }
    }
  }
}
