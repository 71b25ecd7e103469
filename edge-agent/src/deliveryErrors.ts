import { z } from "zod";

export type DeliveryFailureReason = "NETWORK" | "TIMEOUT" | "UPSTREAM_UNAVAILABLE" | "REJECTED";

export type DeliveryErrorOptions = {
  cause?: unknown;
  /** Position in the batch where the store stopped; the records before it were stored. */
  failedIndex?: number | null;
};

export abstract class DeliveryError extends Error {
  abstract readonly retryable: boolean;
  readonly failedIndex: number | null;

  constructor(
    readonly reason: DeliveryFailureReason,
    message: string,
    readonly statusCode: number | null = null,
    options: DeliveryErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.failedIndex = options.failedIndex ?? null;
  }
}

/** Network error, timeout or a status the store may recover from. The batch stays buffered and is retried. */
export class TransientDeliveryFailure extends DeliveryError {
  readonly retryable = true;

  constructor(reason: Exclude<DeliveryFailureReason, "REJECTED">, message: string, statusCode: number | null = null, options?: DeliveryErrorOptions) {
    super(reason, message, statusCode, options);
    Object.setPrototypeOf(this, TransientDeliveryFailure.prototype);
  }
}

/** The store refused the batch itself. Retrying the same bytes will not help. */
export class PermanentRejectionFailure extends DeliveryError {
  readonly retryable = false;

  constructor(statusCode: number, readonly responseText: string, failedIndex: number | null = null) {
    super("REJECTED", `store rejected batch (${statusCode})${responseText ? `: ${responseText}` : ""}`, statusCode, { failedIndex });
    Object.setPrototypeOf(this, PermanentRejectionFailure.prototype);
  }
}

const RETRYABLE_CLIENT_STATUSES = new Set([408, 425, 429]);

const PartialCommitBody = z.object({
  failed_index: z.number().int().nonnegative(),
});

/** Reads `failed_index` from a store error body; null when the body carries none. */
export function failedIndexFrom(responseText: string): number | null {
  let body: unknown;
  try {
    body = JSON.parse(responseText);
  }
  catch {
    return null;
  }
  const parsed = PartialCommitBody.safeParse(body);
  return parsed.success ? parsed.data.failed_index : null;
}

export function failureForStatus(statusCode: number, responseText: string): DeliveryError {
  const failedIndex = failedIndexFrom(responseText);
  if (statusCode >= 500 || RETRYABLE_CLIENT_STATUSES.has(statusCode)) {
    return new TransientDeliveryFailure(
      "UPSTREAM_UNAVAILABLE",
      `store responded ${statusCode}${responseText ? `: ${responseText}` : ""}`,
      statusCode,
      { failedIndex }
    );
  }
  return new PermanentRejectionFailure(statusCode, responseText, failedIndex);
}

function isTimeout(err: unknown): boolean {
  if (!err || typeof err !== "object" || !("name" in err)) return false;
  return err.name === "TimeoutError" || err.name === "AbortError";
}

export function failureForException(err: unknown): DeliveryError {
  if (err instanceof DeliveryError) return err;
  if (isTimeout(err)) {
    return new TransientDeliveryFailure("TIMEOUT", "store request timed out", null, { cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new TransientDeliveryFailure("NETWORK", `store request failed: ${detail}`, null, { cause: err });
}
