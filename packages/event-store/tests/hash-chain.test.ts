/**
 * Tests for the event store hash chain — tamper-evident event log.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@cliffline/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, StoredEventContent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "0xa11ce",
      correlationId: "corr-1",
      source: "vesting",
    },
    payload,
  };
}

const CONTENT: StoredEventContent = {
  event: makeEvent("vesting.manager.initialized", { owner: "0xa11ce" }),
  streamId: "vesting:0xa11ce",
  version: 1,
  globalPosition: 1,
  appendedAt: "2026-01-01T00:00:00.000Z",
};

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(CONTENT, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    expect(computeEventHash(CONTENT, GENESIS_HASH)).toBe(computeEventHash(CONTENT, GENESIS_HASH));
  });

  it("ignores payload key order", () => {
    const a = { ...CONTENT, event: makeEvent("t", { owner: "0x1", index: 0 }) };
    const b = { ...CONTENT, event: makeEvent("t", { index: 0, owner: "0x1" }) };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when the payload changes", () => {
    const tampered = { ...CONTENT, event: makeEvent("vesting.manager.initialized", { owner: "0xb0b" }) };
    expect(computeEventHash(tampered, GENESIS_HASH)).not.toBe(computeEventHash(CONTENT, GENESIS_HASH));
  });

  it("changes when previousHash changes", () => {
    expect(computeEventHash(CONTENT, "other")).not.toBe(computeEventHash(CONTENT, GENESIS_HASH));
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

function chainOf(count: number): StoredEvent[] {
  const store = new InMemoryEventStore();
  for (let i = 0; i < count; i++) {
    store.append(i % 2 === 0 ? "a" : "b", [makeEvent("vesting.schedule.paused", { owner: "0xf00d", index: i })]);
  }
  return [...store.readAll()];
}

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts the chain written by the store", () => {
    const events = chainOf(4);
    expect(verifyHashChain(events)).toEqual({ valid: true, lastVerifiedPosition: 4, errors: [] });
  });

  it("links each event to its predecessor", () => {
    const events = chainOf(3);
    expect(events[0]?.previousHash).toBe(GENESIS_HASH);
    expect(events[1]?.previousHash).toBe(events[0]?.hash);
    expect(events[2]?.previousHash).toBe(events[1]?.hash);
  });

  it("detects a modified payload at its position", () => {
    const events = chainOf(3);
    const original = events[1];
    if (original === undefined) throw new Error("missing event");
    events[1] = { ...original, event: { ...original.event, payload: { owner: "0xf00d", index: 99 } } };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 2/);
  });

  it("detects a removed event", () => {
    const events = chainOf(3);
    events.splice(1, 1);

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([3]);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });
});

describe("InMemoryEventStore.verifyIntegrity", () => {
  it("reports a valid chain for appended events", () => {
    const store = new InMemoryEventStore();
    store.append("a", [
      makeEvent("vesting.manager.initialized", { owner: "0xa" }),
      makeEvent("vesting.reserve.funded", { owner: "0xa", from: "0xa", amount: "5" }),
    ]);
    store.append("b", [makeEvent("vesting.manager.initialized", { owner: "0xb" })]);

    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });
});
