/**
 * Prover input assembly.
 *
 * Layout (little-endian, length-prefixed):
 *   u64 public count ‖ (u64 len ‖ bytes)* ‖ u64 secret count ‖ (u64 len ‖ bytes)*
 */

import { concatBytes, readU64LE, u64LE } from "./hash.js";

const REDACTED = "Secret([REDACTED])";

/** Bytes that never print. Read them with exposeSecret(). */
export class Secret {
  #value: Uint8Array;

  constructor(value: Uint8Array) {
    this.#value = Uint8Array.from(value);
  }

  exposeSecret(): Uint8Array {
    return this.#value;
  }

  get length(): number {
    return this.#value.length;
  }

  wipe(): void {
    this.#value.fill(0);
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return REDACTED;
  }
}

export type ClaimInput = {
  publicData: Uint8Array[];
  secrets: Uint8Array[];
};

function encodeSection(items: readonly Uint8Array[]): Uint8Array {
  const parts: Uint8Array[] = [u64LE(BigInt(items.length))];
  for (const item of items) {
    parts.push(u64LE(BigInt(item.length)), item);
  }
  return concatBytes(...parts);
}

export class ClaimInputAssembler {
  private publicData: Uint8Array[] = [];
  private secrets: Secret[] = [];

  addPublicData(data: Uint8Array): this {
    this.publicData.push(Uint8Array.from(data));
    return this;
  }

  addPublicDataBatch(items: Iterable<Uint8Array>): this {
    for (const item of items) this.addPublicData(item);
    return this;
  }

  addSecret(secret: Uint8Array | Secret): this {
    this.secrets.push(secret instanceof Secret ? secret : new Secret(secret));
    return this;
  }

  addSecretsBatch(items: Iterable<Uint8Array | Secret>): this {
    for (const item of items) this.addSecret(item);
    return this;
  }

  get publicDataCount(): number {
    return this.publicData.length;
  }

  get secretsCount(): number {
    return this.secrets.length;
  }

  /** Public section first, then secrets. Does not consume the assembler. */
  build(): Uint8Array {
    return concatBytes(
      encodeSection(this.publicData),
      encodeSection(this.secrets.map((s) => s.exposeSecret()))
    );
  }

  clear(): void {
    for (const secret of this.secrets) secret.wipe();
    this.publicData = [];
    this.secrets = [];
  }
}

function decodeSection(bytes: Uint8Array, offset: number): { items: Uint8Array[]; offset: number } {
  const count = readU64LE(bytes, offset);
  let cursor = offset + 8;
  const items: Uint8Array[] = [];
  for (let i = 0n; i < count; i++) {
    const len = readU64LE(bytes, cursor);
    cursor += 8;
    if (BigInt(cursor) + len > BigInt(bytes.length)) {
      throw new RangeError("Unexpected end of input reading item");
    }
    const end = cursor + Number(len);
    items.push(bytes.slice(cursor, end));
    cursor = end;
  }
  return { items, offset: cursor };
}

/** Inverse of ClaimInputAssembler.build(). Throws on truncated or trailing bytes. */
export function decodeClaimInput(bytes: Uint8Array): ClaimInput {
  const pub = decodeSection(bytes, 0);
  const sec = decodeSection(bytes, pub.offset);
  if (sec.offset !== bytes.length) {
    throw new RangeError(`Unexpected ${bytes.length - sec.offset} trailing bytes`);
  }
  return { publicData: pub.items, secrets: sec.items };
}

/** Byte length of the public section at the head of an assembled input. */
export function publicSectionLength(bytes: Uint8Array): number {
  return decodeSection(bytes, 0).offset;
}
