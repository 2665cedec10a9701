/**
 * ZK audit trail: append-only, hash-chained log of every action taken on a claim.
 *
 * Each entry is hashed over a fixed 153-byte layout, never over JSON:
 *   timestamp i64 BE ‖ action u8 ‖ input_hash ‖ output_hash ‖ decision_logic_hash
 *   ‖ confidence f64 BE ‖ previous_hash ‖ nonce u64 BE
 * trail_hash = sha256(u64 BE entry count ‖ entry encodings...)
 */

import { appendFileSync } from "node:fs";
import { z } from "zod";
import { bytesToPrefixedHex, concatBytes, f64BE, hexToBytes, i64BE, sha256, u64BE } from "./hash.js";
import { AUDIT_ACTIONS, type AuditAction, type AuditEntry, type Hex } from "./types.js";

export const ZERO_HASH: Hex = `0x${"00".repeat(32)}`;

export type AuditSink = (entry: AuditEntry) => void;

export type AuditTrailOptions = {
  /** Unix seconds. */
  clock?: () => number;
  /** Receives each entry after it is appended, in order. */
  sink?: AuditSink;
};

export type AuditTrailJson = {
  entries: AuditEntry[];
  trail_hash: Hex;
  created_at: number;
};

const hash32 = z.custom<Hex>((v) => typeof v === "string" && /^0x[0-9a-f]{64}$/.test(v), "expected 0x-prefixed 32-byte hex");

const AuditEntrySchema = z.object({
  timestamp: z.number().int().safe(),
  action: z.enum(AUDIT_ACTIONS),
  input_hash: hash32,
  output_hash: hash32,
  decision_logic_hash: hash32,
  confidence: z.number(),
  previous_hash: hash32,
  nonce: z.number().int().nonnegative().safe(),
});

const AuditTrailSchema = z.object({
  entries: z.array(AuditEntrySchema),
  trail_hash: hash32,
  created_at: z.number().int().safe(),
});

function digest(data: Uint8Array): Hex {
  return bytesToPrefixedHex(sha256(data));
}

export function encodeAuditEntry(entry: AuditEntry): Uint8Array {
  return concatBytes(
    i64BE(entry.timestamp),
    Uint8Array.of(AUDIT_ACTIONS.indexOf(entry.action)),
    hexToBytes(entry.input_hash, 32),
    hexToBytes(entry.output_hash, 32),
    hexToBytes(entry.decision_logic_hash, 32),
    // JSON writes -0 as 0; both encode as +0.
    f64BE(entry.confidence === 0 ? 0 : entry.confidence),
    hexToBytes(entry.previous_hash, 32),
    u64BE(BigInt(entry.nonce))
  );
}

export function hashAuditEntry(entry: AuditEntry): Hex {
  return digest(encodeAuditEntry(entry));
}

export function computeTrailHash(entries: readonly AuditEntry[]): Hex {
  return digest(concatBytes(u64BE(BigInt(entries.length)), ...entries.map(encodeAuditEntry)));
}

function assertConfidence(confidence: number): void {
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new RangeError(`confidence must be within [0, 1], got ${confidence}`);
  }
}

export class ZkAuditTrail {
  private readonly log: AuditEntry[] = [];
  private hash: Hex;
  private readonly clock: () => number;
  private readonly sink?: AuditSink;
  private created: number;

  constructor(options: AuditTrailOptions = {}) {
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
    this.sink = options.sink;
    this.created = this.clock();
    this.hash = computeTrailHash(this.log);
  }

  /**
   * Single append point. Synchronous, so appends cannot interleave on the
   * event loop: nonce and previous_hash are assigned against the current tail.
   */
  addEntry(
    action: AuditAction,
    input: Uint8Array,
    output: Uint8Array,
    decisionLogic: Uint8Array,
    confidence: number
  ): AuditEntry {
    assertConfidence(confidence);
    const last = this.log.at(-1);

    const entry: AuditEntry = Object.freeze({
      timestamp: this.clock(),
      action,
      input_hash: digest(input),
      output_hash: digest(output),
      decision_logic_hash: digest(decisionLogic),
      confidence: confidence === 0 ? 0 : confidence,
      previous_hash: last ? hashAuditEntry(last) : ZERO_HASH,
      nonce: this.log.length,
    });

    this.log.push(entry);
    this.hash = computeTrailHash(this.log);
    this.sink?.(entry);
    return entry;
  }

  verifyIntegrity(): boolean {
    for (let i = 0; i < this.log.length; i++) {
      const entry = this.log[i];
      if (entry.nonce !== i) return false;
      const expectedPrevious = i === 0 ? ZERO_HASH : hashAuditEntry(this.log[i - 1]);
      if (entry.previous_hash !== expectedPrevious) return false;
    }
    return computeTrailHash(this.log) === this.hash;
  }

  get entries(): readonly AuditEntry[] {
    return [...this.log];
  }

  get length(): number {
    return this.log.length;
  }

  get isEmpty(): boolean {
    return this.log.length === 0;
  }

  get createdAt(): number {
    return this.created;
  }

  get trailHash(): Hex {
    return this.hash;
  }

  toJSON(): AuditTrailJson {
    return {
      entries: this.log.map((e) => ({ ...e })),
      trail_hash: this.hash,
      created_at: this.created,
    };
  }

  exportJson(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }

  /**
   * Restore an exported trail exactly as stored. Nothing is re-linked or
   * re-hashed, so call verifyIntegrity() before trusting it.
   */
  static fromJSON(json: unknown, options: AuditTrailOptions = {}): ZkAuditTrail {
    const parsed = AuditTrailSchema.parse(json);
    const trail = new ZkAuditTrail(options);
    trail.created = parsed.created_at;
    for (const entry of parsed.entries) {
      trail.log.push(Object.freeze({ ...entry }));
    }
    trail.hash = parsed.trail_hash;
    return trail;
  }
}

/** Append-only JSON Lines persistence, one entry per line in append order. */
export function jsonlFileSink(path: string): AuditSink {
  return (entry) => {
    appendFileSync(path, `${JSON.stringify(entry)}\n`, "utf-8");
  };
}
