import { describe, expect, it } from "vitest";
import {
  U64_MAX,
  bytesEqual,
  bytesToPrefixedHex,
  hexToBytes,
  i64BE,
  isAllZero,
  keccak256,
  readU64LE,
  sha256Hex,
  u32LE,
  u64BE,
  u64LE,
  utf8,
} from "../src/hash.js";

describe("digests", () => {
  it("sha256Hex is lowercase hex without prefix", () => {
    expect(sha256Hex(utf8(""))).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
    expect(sha256Hex(utf8("abc"))).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("keccak256 is 0x-prefixed", () => {
    expect(keccak256(new Uint8Array(0))).toBe("0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470");
  });
});

describe("hexToBytes", () => {
  it("accepts an optional 0x prefix", () => {
    expect(hexToBytes("0xabcd")).toEqual(Uint8Array.of(0xab, 0xcd));
    expect(hexToBytes("abcd")).toEqual(Uint8Array.of(0xab, 0xcd));
  });

  it("rejects odd length and non-hex", () => {
    expect(() => hexToBytes("abc")).toThrow("Malformed hex string");
    expect(() => hexToBytes("zz")).toThrow("Malformed hex string");
  });

  it("enforces the expected length", () => {
    expect(() => hexToBytes("00", 2)).toThrow("Expected 2 bytes, got 1");
  });

  it("round-trips through bytesToPrefixedHex", () => {
    expect(bytesToPrefixedHex(hexToBytes("0x00ff10"))).toBe("0x00ff10");
  });
});

describe("integer encodings", () => {
  it("u64 little and big endian", () => {
    expect(u64LE(12345n)).toEqual(Uint8Array.of(0x39, 0x30, 0, 0, 0, 0, 0, 0));
    expect(u64BE(1n)).toEqual(Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 1));
  });

  it("rejects values outside u64", () => {
    expect(() => u64LE(-1n)).toThrow(RangeError);
    expect(() => u64BE(U64_MAX + 1n)).toThrow(RangeError);
    expect(u64LE(U64_MAX)).toEqual(new Uint8Array(8).fill(0xff));
  });

  it("i64BE encodes negatives in two's complement", () => {
    expect(i64BE(-1)).toEqual(new Uint8Array(8).fill(0xff));
    expect(() => i64BE(1.5)).toThrow(RangeError);
  });

  it("u32LE bounds", () => {
    expect(u32LE(258)).toEqual(Uint8Array.of(2, 1, 0, 0));
    expect(() => u32LE(-1)).toThrow(RangeError);
  });

  it("readU64LE reads at an offset and refuses to overrun", () => {
    const bytes = Uint8Array.of(0xee, ...u64LE(42n));
    expect(readU64LE(bytes, 1)).toBe(42n);
    expect(() => readU64LE(bytes, 2)).toThrow("Unexpected end of input reading u64");
  });
});

describe("byte helpers", () => {
  it("isAllZero and bytesEqual", () => {
    expect(isAllZero(new Uint8Array(4))).toBe(true);
    expect(isAllZero(Uint8Array.of(0, 1))).toBe(false);
    expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(true);
    expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 3))).toBe(false);
    expect(bytesEqual(Uint8Array.of(1), Uint8Array.of(1, 0))).toBe(false);
  });
});
