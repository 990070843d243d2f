/**
 * Tests for config.ts: parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys("k1:teacher:class-a:ms-rivera")).toEqual([
      { key: "k1", role: "teacher", tenantId: "class-a", actorId: "ms-rivera" },
    ]);
  });

  it("parses multiple comma-separated entries and trims them", () => {
    const keys = parseApiKeys(" k1:teacher:class-a:t1 , k2:student:class-a:s1,k3:system:class-b:cron ");
    expect(keys).toEqual([
      { key: "k1", role: "teacher", tenantId: "class-a", actorId: "t1" },
      { key: "k2", role: "student", tenantId: "class-a", actorId: "s1" },
      { key: "k3", role: "system", tenantId: "class-b", actorId: "cron" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:teacher:t1")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:teacher:t1:x:y")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":teacher:t1:a1")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:admin:t1:a1")).toThrow(
      'Invalid role "admin" in API_KEYS. Must be one of: teacher, system, student',
    );
  });

  it("throws on empty tenant or actor", () => {
    expect(() => parseApiKeys("k1:teacher::a1")).toThrow("Tenant ID cannot be empty");
    expect(() => parseApiKeys("k1:teacher:t1:")).toThrow("Actor ID cannot be empty");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_KEYS: "",
      DEFAULT_TENANT_ID: "default",
      IDEMPOTENCY_TTL_MS: 86400000,
    });
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "silent",
      NODE_ENV: "production",
      DEFAULT_TENANT_ID: "room-12",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("silent");
    expect(config.NODE_ENV).toBe("production");
    expect(config.DEFAULT_TENANT_ID).toBe("room-12");
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
    expect(() => loadConfig({ IDEMPOTENCY_TTL_MS: "500" })).toThrow();
  });
});
