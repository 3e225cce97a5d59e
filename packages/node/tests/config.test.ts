/**
 * Tests for config.ts — parseApiKeys + loadConfig.
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
    const keys = parseApiKeys("abc123:admin:admin");
    expect(keys).toEqual([{ key: "abc123", role: "admin", address: "admin" }]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys("k1:admin:a1,k2:staker:a2,k3:viewer:a3");
    expect(keys).toEqual([
      { key: "k1", role: "admin", address: "a1" },
      { key: "k2", role: "staker", address: "a2" },
      { key: "k3", role: "viewer", address: "a3" },
    ]);
  });

  it("trims whitespace around entries", () => {
    const keys = parseApiKeys("  k1:admin:a1 , k2:viewer:a2  ");
    expect(keys.map((k) => k.key)).toEqual(["k1", "k2"]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin:a1")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:operator:a1")).toThrow('Invalid role "operator"');
  });

  it("throws on empty address", () => {
    expect(() => parseApiKeys("k1:staker:")).toThrow("Address cannot be empty");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_KEYS: "",
      ADMIN_ADDRESS: "admin",
      LEDGER_ADDRESS: "stake-ledger",
      BASE_ASSET_SYMBOL: "STK",
      REWARD_ASSET_SYMBOL: "esSTK",
    });
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      ADMIN_ADDRESS: " treasury ",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.ADMIN_ADDRESS).toBe("treasury");
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
  });

  it("throws on a blank administrator", () => {
    expect(() => loadConfig({ ADMIN_ADDRESS: "   " })).toThrow();
  });

  it("throws when the administrator is the ledger custody address", () => {
    expect(() => loadConfig({ ADMIN_ADDRESS: "stake-ledger" })).toThrow(
      /ADMIN_ADDRESS must differ from LEDGER_ADDRESS/,
    );
  });
});
