import type { FastifyReply } from "fastify";
import { IngestServiceError } from "../services/ingestService.js";
import { StorageError } from "../storage/recordStore.js";

export type NormalizedHttpError = {
  statusCode: number;
  body: Record<string, unknown>;
  headers?: Record<string, string>;
};

const STATUS_CODES: Record<number, string> = {
  400: "bad_request",
  404: "not_found",
  413: "payload_too_large",
  415: "unsupported_media_type",
  422: "unprocessable_entity",
  429: "rate_limited",
  500: "internal_error",
  503: "service_unavailable",
};

export function httpError(statusCode: number, error: string, message?: string): Error & { statusCode: number; code: string } {
  const err = new Error(message ?? error);
  return Object.assign(err, { statusCode, code: error });
}

function toSnakeCase(value: string): string {
  return value.trim().replace(/[\s-]+/g, "_").toLowerCase();
}

function statusCodeFrom(err: unknown, fallbackStatusCode: number): number {
  const statusCode = typeof err === "object" && err && "statusCode" in err
    ? Number(err.statusCode)
    : Number.NaN;
  return Number.isFinite(statusCode) && statusCode >= 100 ? statusCode : fallbackStatusCode;
}

function errorCodeFrom(err: unknown, statusCode: number): string {
  if (err instanceof IngestServiceError) return toSnakeCase(err.reason);
  if (err instanceof StorageError) return "storage_unavailable";
  if (typeof err === "object" && err) {
    if ("code" in err && typeof err.code === "string" && err.code.trim().length > 0) return toSnakeCase(err.code);
    if ("error" in err && typeof err.error === "string" && err.error.trim().length > 0) return toSnakeCase(err.error);
  }
  return STATUS_CODES[statusCode] ?? (statusCode >= 500 ? "internal_error" : "bad_request");
}

function messageFrom(err: unknown): string | undefined {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return undefined;
}

export function toHttpError(err: unknown, fallbackStatusCode = 500): NormalizedHttpError {
  const statusCode = statusCodeFrom(err, fallbackStatusCode);
  const error = errorCodeFrom(err, statusCode);
  const message = messageFrom(err);
  const body: Record<string, unknown> = { error };
  if (message && message !== error) body.message = message;
  if (err instanceof IngestServiceError && err.failedIndex !== null) {
    body.committed = err.committed;
    body.failed_index = err.failedIndex;
  }
  return { statusCode, body };
}

export function sendHttpError(rep: FastifyReply, err: unknown, fallbackStatusCode = 500) {
  const normalized = toHttpError(err, fallbackStatusCode);
  if (normalized.headers) rep.headers(normalized.headers);
  return rep.code(normalized.statusCode).send(normalized.body);
}
