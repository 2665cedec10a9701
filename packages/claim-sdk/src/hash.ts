/**
 * Hashing and byte helpers shared by every claim protocol.
 * SHA-256 for TLS proofs, RWA leaves and the audit chain; Keccak-256 for EVM notary hashes.
 */

import { sha256 as nobleSha256 } from "@noble/hashes/sha256";
import { bytesToHex as nobleBytesToHex, concatBytes as nobleConcatBytes, hexToBytes as nobleHexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { keccak256 as viemKeccak256 } from "viem";
import type { Hex } from "./types.js";

export const U64_MAX = 0xffff_ffff_ffff_ffffn;
const U32_MAX = 0xffff_ffff;

const HEX_RE = /^[0-9a-fA-F]*$/;

export function sha256(data: Uint8Array): Uint8Array {
  return nobleSha256(data);
}

/** Lowercase hex, no 0x prefix (fixture and TLS proof convention). */
export function sha256Hex(data: Uint8Array): string {
  return nobleBytesToHex(nobleSha256(data));
}

export function keccak256(data: Uint8Array): Hex {
  return viemKeccak256(data);
}

export function utf8(text: string): Uint8Array {
  return utf8ToBytes(text);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return nobleConcatBytes(...parts);
}

export function bytesToHex(bytes: Uint8Array): string {
  return nobleBytesToHex(bytes);
}

export function bytesToPrefixedHex(bytes: Uint8Array): Hex {
  return `0x${nobleBytesToHex(bytes)}`;
}

/**
 * Decode hex with or without a 0x prefix.
 * Throws if the string is not hex, has odd length, or does not decode to `expectedLength` bytes.
 */
export function hexToBytes(input: string, expectedLength?: number): Uint8Array {
  const raw = input.startsWith("0x") || input.startsWith("0X") ? input.slice(2) : input;
  if (raw.length % 2 !== 0 || !HEX_RE.test(raw)) {
    throw new Error("Malformed hex string");
  }
  const bytes = nobleHexToBytes(raw);
  if (expectedLength !== undefined && bytes.length !== expectedLength) {
    throw new Error(`Expected ${expectedLength} bytes, got ${bytes.length}`);
  }
  return bytes;
}

export function isAllZero(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) diff |= a[i] ^ b[i];
  return diff === 0;
}

function assertU64(value: bigint): void {
  if (value < 0n || value > U64_MAX) {
    throw new RangeError(`Value ${value} is outside the u64 range`);
  }
}

export function u64LE(value: bigint): Uint8Array {
  assertU64(value);
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, value, true);
  return out;
}

export function u64BE(value: bigint): Uint8Array {
  assertU64(value);
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, value, false);
  return out;
}

export function i64BE(value: number): Uint8Array {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Value ${value} is not a safe integer`);
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigInt64(0, BigInt(value), false);
  return out;
}

export function f64BE(value: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setFloat64(0, value, false);
  return out;
}

export function u32LE(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new RangeError(`Value ${value} is outside the u32 range`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value, true);
  return out;
}

export function readU64LE(bytes: Uint8Array, offset: number): bigint {
  if (offset + 8 > bytes.length) {
    throw new RangeError("Unexpected end of input reading u64");
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(offset, true);
}
