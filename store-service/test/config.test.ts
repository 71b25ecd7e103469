import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 4020,
      host: "0.0.0.0",
      LOG_LEVEL: "info",
      RECORD_STORE: "memory",
      FIRESTORE_COLLECTION: "processed_agent_data",
      RATE_LIMIT_MAX: 600,
      BODY_LIMIT_BYTES: 1048576,
      SUBSCRIBER_SEND_TIMEOUT_MS: 5000,
    });
  });

  it("reads PORT and falls back to STORE_SERVICE_PORT", () => {
    expect(loadConfig({ PORT: "8080", STORE_SERVICE_PORT: "9090" }).port).toBe(8080);
    expect(loadConfig({ STORE_SERVICE_PORT: "9090" }).port).toBe(9090);
  });

  it("rejects an unknown record store", () => {
    expect(() => loadConfig({ RECORD_STORE: "postgres" })).toThrow();
  });
});
