import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  ZERO_HASH,
  ZkAuditTrail,
  computeTrailHash,
  encodeAuditEntry,
  hashAuditEntry,
  jsonlFileSink,
  type AuditTrailJson,
} from "../src/audit.js";
import { bytesToPrefixedHex, sha256, u64BE, utf8 } from "../src/hash.js";
import type { AuditEntry } from "../src/types.js";

function filledTrail(options: ConstructorParameters<typeof ZkAuditTrail>[0] = {}): ZkAuditTrail {
  let now = 1000;
  const trail = new ZkAuditTrail({ clock: () => now++, ...options });
  trail.addEntry("extract-claim", utf8("statement"), utf8("5000000"), utf8("regex"), 0.72);
  trail.addEntry("generate-proof", utf8("public"), utf8("receipt"), utf8("balance>=threshold"), 1);
  trail.addEntry("verify-proof", utf8("receipt"), utf8("valid"), utf8("verify"), 1);
  return trail;
}

function tamper(json: AuditTrailJson, index: number, patch: Partial<AuditEntry>): AuditTrailJson {
  return {
    ...json,
    entries: json.entries.map((entry, i) => (i === index ? { ...entry, ...patch } : entry)),
  };
}

describe("ZkAuditTrail", () => {
  it("starts empty with a well-defined trail hash", () => {
    const trail = new ZkAuditTrail({ clock: () => 42 });
    expect(trail.isEmpty).toBe(true);
    expect(trail.createdAt).toBe(42);
    expect(trail.trailHash).toBe(bytesToPrefixedHex(sha256(u64BE(0n))));
    expect(trail.verifyIntegrity()).toBe(true);
  });

  it("links entries by nonce and previous hash", () => {
    const trail = filledTrail();
    const [first, second, third] = trail.entries;

    expect(trail.length).toBe(3);
    expect(first.nonce).toBe(0);
    expect(first.previous_hash).toBe(ZERO_HASH);
    expect(first.timestamp).toBe(1001);
    expect(first.input_hash).toBe(bytesToPrefixedHex(sha256(utf8("statement"))));
    expect(second.previous_hash).toBe(hashAuditEntry(first));
    expect(third.previous_hash).toBe(hashAuditEntry(second));
    expect(third.nonce).toBe(2);
    expect(trail.trailHash).toBe(computeTrailHash(trail.entries));
    expect(trail.verifyIntegrity()).toBe(true);
  });

  it("encodes each entry into 153 bytes", () => {
    const [first] = filledTrail().entries;
    const encoded = encodeAuditEntry(first);
    expect(encoded).toHaveLength(153);
    expect(encoded[8]).toBe(0);
  });

  it("hands out frozen entries and a copy of the log", () => {
    const trail = filledTrail();
    expect(Object.isFrozen(trail.entries[0])).toBe(true);
    const snapshot = trail.entries;
    trail.addEntry("export-verifier", utf8("evm"), utf8("bytecode"), utf8("export"), 1);
    expect(snapshot).toHaveLength(3);
    expect(trail.length).toBe(4);
  });

  it("rejects confidence outside [0, 1]", () => {
    const trail = new ZkAuditTrail();
    expect(() => trail.addEntry("verify-proof", utf8("a"), utf8("b"), utf8("c"), 1.5)).toThrow(RangeError);
    expect(() => trail.addEntry("verify-proof", utf8("a"), utf8("b"), utf8("c"), Number.NaN)).toThrow(RangeError);
    expect(trail.isEmpty).toBe(true);
  });

  it("round-trips through JSON", () => {
    const trail = filledTrail();
    const restored = ZkAuditTrail.fromJSON(JSON.parse(trail.exportJson()));

    expect(restored.entries).toEqual(trail.entries);
    expect(restored.trailHash).toBe(trail.trailHash);
    expect(restored.createdAt).toBe(1000);
    expect(restored.verifyIntegrity()).toBe(true);
  });

  it("stores a negative-zero confidence as zero", () => {
    const trail = new ZkAuditTrail({ clock: () => 1000 });
    const entry = trail.addEntry("extract-claim", utf8("a"), utf8("b"), utf8("c"), -0);

    expect(Object.is(entry.confidence, 0)).toBe(true);
    const restored = ZkAuditTrail.fromJSON(JSON.parse(trail.exportJson()));
    expect(restored.trailHash).toBe(trail.trailHash);
    expect(restored.verifyIntegrity()).toBe(true);
  });

  it("encodes zero and negative zero confidence alike", () => {
    const [first] = filledTrail().entries;
    expect(encodeAuditEntry({ ...first, confidence: -0 })).toEqual(encodeAuditEntry({ ...first, confidence: 0 }));
  });

  it("continues the chain after a restore", () => {
    const restored = ZkAuditTrail.fromJSON(filledTrail().toJSON(), { clock: () => 2000 });
    const entry = restored.addEntry("submit-to-chain", utf8("tx"), utf8("hash"), utf8("submit"), 1);

    expect(entry.nonce).toBe(3);
    expect(entry.timestamp).toBe(2000);
    expect(entry.previous_hash).toBe(hashAuditEntry(restored.entries[2]));
    expect(restored.verifyIntegrity()).toBe(true);
  });

  it.each<[string, number, Partial<AuditEntry>]>([
    ["timestamp", 0, { timestamp: 999 }],
    ["action", 1, { action: "submit-to-chain" }],
    ["input_hash", 2, { input_hash: ZERO_HASH }],
    ["output_hash", 0, { output_hash: ZERO_HASH }],
    ["decision_logic_hash", 1, { decision_logic_hash: ZERO_HASH }],
    ["confidence", 2, { confidence: 0.5 }],
    ["previous_hash", 1, { previous_hash: ZERO_HASH }],
    ["nonce", 2, { nonce: 7 }],
  ])("detects a mutated %s", (_field, index, patch) => {
    const json = tamper(filledTrail().toJSON(), index, patch);
    expect(ZkAuditTrail.fromJSON(json).verifyIntegrity()).toBe(false);
  });

  it("detects a replaced trail hash", () => {
    const json = filledTrail().toJSON();
    expect(ZkAuditTrail.fromJSON({ ...json, trail_hash: ZERO_HASH }).verifyIntegrity()).toBe(false);
  });

  it("detects a dropped entry", () => {
    const json = filledTrail().toJSON();
    expect(ZkAuditTrail.fromJSON({ ...json, entries: json.entries.slice(0, 2) }).verifyIntegrity()).toBe(false);
  });

  it("refuses to load unknown actions", () => {
    const json = filledTrail().toJSON();
    expect(() =>
      ZkAuditTrail.fromJSON({ ...json, entries: [{ ...json.entries[0], action: "delete-entry" }] })
    ).toThrow();
  });
});

describe("sinks", () => {
  it("receives every entry in append order", () => {
    const seen: number[] = [];
    filledTrail({ sink: (entry) => seen.push(entry.nonce) });
    expect(seen).toEqual([0, 1, 2]);
  });

  it("jsonlFileSink appends one JSON line per entry", () => {
    const dir = mkdtempSync(join(tmpdir(), "attestkit-audit-"));
    try {
      const path = join(dir, "audit.jsonl");
      const trail = filledTrail({ sink: jsonlFileSink(path) });
      const lines = readFileSync(path, "utf-8").trimEnd().split("\n");

      expect(lines).toHaveLength(3);
      expect(JSON.parse(lines[2])).toEqual({ ...trail.entries[2] });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
