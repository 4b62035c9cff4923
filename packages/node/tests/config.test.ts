/**
 * Tests for config.ts — parseApiKeys, parseAllocations, loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseAllocations, parseApiKeys } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single entry and normalizes the address", () => {
    expect(parseApiKeys("abc123:0xA11CE")).toEqual([
      { key: "abc123", address: "0xa11ce" },
    ]);
  });

  it("parses comma-separated entries, trimming whitespace", () => {
    const keys = parseApiKeys("  k1:0xa11ce , k2:0xb0b  ");
    expect(keys).toEqual([
      { key: "k1", address: "0xa11ce" },
      { key: "k2", address: "0xb0b" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow(
      'Invalid API_KEYS entry: "badentry". Expected format: key:address',
    );
    expect(() => parseApiKeys("a:0x1:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":0xa11ce")).toThrow("API key cannot be empty");
  });

  it("throws on malformed or null addresses", () => {
    expect(() => parseApiKeys("k1:alice")).toThrow('Invalid address "alice" in API_KEYS');
    expect(() => parseApiKeys("k1:0x0")).toThrow('Invalid address "0x0" in API_KEYS');
  });
});

// =============================================================================
// parseAllocations
// =============================================================================

describe("parseAllocations", () => {
  it("returns empty array for empty string", () => {
    expect(parseAllocations("")).toEqual([]);
  });

  it("parses address:amount pairs as bigint base units", () => {
    expect(parseAllocations("0xF00D:10000,0xb0b:5")).toEqual([
      { address: "0xf00d", amount: 10_000n },
      { address: "0xb0b", amount: 5n },
    ]);
  });

  it("rejects zero, fractional and negative amounts", () => {
    for (const raw of ["0xf00d:0", "0xf00d:1.5", "0xf00d:-3"]) {
      expect(() => parseAllocations(raw)).toThrow(/Must be a positive integer in base units/);
    }
  });

  it("rejects entries without an amount", () => {
    expect(() => parseAllocations("0xf00d")).toThrow(
      'Invalid GENESIS_ALLOCATIONS entry: "0xf00d". Expected format: address:amount',
    );
  });

  it("rejects bad addresses", () => {
    expect(() => parseAllocations("bob:10")).toThrow(
      'Invalid address "bob" in GENESIS_ALLOCATIONS',
    );
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
      TOKEN_SYMBOL: "VEST",
      TOKEN_DECIMALS: 8,
      GENESIS_ALLOCATIONS: "",
    });
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      TOKEN_SYMBOL: "CLF",
      TOKEN_DECIMALS: "18",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.TOKEN_SYMBOL).toBe("CLF");
    expect(config.TOKEN_DECIMALS).toBe(18);
  });

  it("throws on out-of-range values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
    expect(() => loadConfig({ TOKEN_DECIMALS: "19" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
