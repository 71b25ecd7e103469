import type { IncomingMessage } from "node:http";
import { randomUUID } from "node:crypto";
import type { Duplex } from "node:stream";
import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { WebSocket, WebSocketServer } from "ws";
import { UserId } from "../lib/validation.js";
import type { ServiceLogger } from "../logger.js";
import type { SubscriberChannel, SubscriptionRegistry } from "../services/subscriptionRegistry.js";

export interface SubscriptionRouteOptions extends FastifyPluginOptions {
  registry: SubscriptionRegistry;
}

const SUBSCRIPTION_PATH = /^\/ws\/([^/]+)\/?$/;
const CLOSE_GRACE_MS = 1_000;

export class ChannelClosedError extends Error {
  constructor(readonly channelId: string) {
    super(`channel ${channelId} is closed`);
    Object.setPrototypeOf(this, ChannelClosedError.prototype);
  }
}

export class WebSocketChannel implements SubscriberChannel {
  constructor(private readonly socket: WebSocket, readonly id: string) {}

  send(payload: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ChannelClosedError(this.id));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(payload, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }
}

/** Extracts the user id from `/ws/:userId`; null for any other path or a malformed id. */
export function parseSubscriptionPath(url: string | undefined): number | null {
  if (!url) return null;
  const { pathname } = new URL(url, "http://localhost");
  const match = SUBSCRIPTION_PATH.exec(pathname);
  if (!match) return null;
  const parsed = UserId.safeParse(match[1]);
  return parsed.success ? parsed.data : null;
}

/** Registers the socket and removes it again once the peer goes away. Inbound frames are ignored. */
export function attachSubscriber(registry: SubscriptionRegistry, userId: number, socket: WebSocket, logger: ServiceLogger): WebSocketChannel {
  const channel = new WebSocketChannel(socket, `${userId}:${randomUUID()}`);
  registry.subscribe(userId, channel);
  socket.on("close", () => {
    registry.unsubscribe(userId, channel);
  });
  socket.on("error", (err) => {
    logger.warn({ err, userId, channelId: channel.id }, "subscriber socket error");
    registry.unsubscribe(userId, channel);
  });
  return channel;
}

/** Waits for clients to finish the close handshake, then terminates whatever is left. */
async function drainClients(wss: WebSocketServer): Promise<void> {
  const closing = [...wss.clients].map((client) => new Promise<void>((resolve) => {
    if (client.readyState === WebSocket.CLOSED) resolve();
    else client.once("close", () => resolve());
  }));
  let timer: NodeJS.Timeout | undefined;
  const grace = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, CLOSE_GRACE_MS);
    timer.unref();
  });
  await Promise.race([Promise.all(closing), grace]);
  clearTimeout(timer);
  for (const client of wss.clients) client.terminate();
}

function rejectUpgrade(socket: Duplex, status: string) {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export async function subscriptionRoutes(fastify: FastifyInstance, options: SubscriptionRouteOptions) {
  const { registry } = options;
  const wss = new WebSocketServer({ noServer: true });

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const userId = parseSubscriptionPath(request.url);
    if (userId === null) {
      rejectUpgrade(socket, "404 Not Found");
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      attachSubscriber(registry, userId, ws, fastify.log);
    });
  };
  fastify.server.on("upgrade", onUpgrade);

  fastify.addHook("preClose", async () => {
    fastify.server.off("upgrade", onUpgrade);
    registry.closeAll();
    await drainClients(wss);
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  });
}
