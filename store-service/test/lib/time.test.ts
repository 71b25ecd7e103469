import { Timestamp } from "firebase-admin/firestore";
import { describe, expect, it } from "vitest";
import { timestampToIsoString, toDate } from "../../src/lib/time.js";

describe("timestampToIsoString", () => {
  it("reads Firestore timestamps, dates, millis and text", () => {
    const iso = "2024-01-01T00:00:00.000Z";
    expect(timestampToIsoString(Timestamp.fromDate(new Date(iso)))).toBe(iso);
    expect(timestampToIsoString(new Date(iso))).toBe(iso);
    expect(timestampToIsoString(Date.UTC(2024, 0, 1))).toBe(iso);
    expect(timestampToIsoString("2024-01-01T02:00:00+02:00")).toBe(iso);
  });

  it("returns null for anything that is not a valid point in time", () => {
    expect(toDate("not a date")).toBeNull();
    expect(toDate(new Date(Number.NaN))).toBeNull();
    expect(toDate({ seconds: 1 })).toBeNull();
    expect(timestampToIsoString(undefined)).toBeNull();
  });
});
