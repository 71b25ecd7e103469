import { Timestamp } from "firebase-admin/firestore";

/** Firestore Timestamp, Date, epoch millis or date text to a valid Date; null otherwise. */
export function toDate(input: unknown): Date | null {
  let date: Date | null = null;
  if (input instanceof Timestamp) date = input.toDate();
  else if (input instanceof Date) date = input;
  else if (typeof input === "number" || typeof input === "string") date = new Date(input);
  return date && !Number.isNaN(date.getTime()) ? date : null;
}

export function timestampToIsoString(input: unknown): string | null {
  const date = toDate(input);
  return date ? date.toISOString() : null;
}
