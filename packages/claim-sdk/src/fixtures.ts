/**
 * Recorded TLS fixture triple on disk: metadata.json, cert_chain.pem, response_body.json.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { FixtureError } from "./errors.js";
import type { RecordedTlsProof } from "./types.js";

export const METADATA_FILE = "metadata.json";
export const CERT_CHAIN_FILE = "cert_chain.pem";
export const RESPONSE_BODY_FILE = "response_body.json";

/** Bare hex, as sha256Hex and bytesToHex write it; no 0x prefix. */
const hexString = (bytes: number) =>
  z.string().regex(new RegExp(`^[0-9a-fA-F]{${bytes * 2}}$`), `expected ${bytes}-byte hex without 0x`);

export const TlsFixtureMetadataSchema = z.object({
  domain: z.string().min(1),
  timestamp: z.number().int().nonnegative().safe(),
  response_sha256: hexString(32),
  cert_chain_sha256: hexString(32),
  notary_pubkey: hexString(32),
  signature: hexString(64),
});

export type TlsFixtureMetadata = z.infer<typeof TlsFixtureMetadataSchema>;

export type TlsFixture = {
  proof: RecordedTlsProof;
  certChain: Uint8Array;
  responseBody: Uint8Array;
};

export function metadataToProof(meta: TlsFixtureMetadata): RecordedTlsProof {
  return {
    domain: meta.domain,
    timestamp: meta.timestamp,
    response_hash: meta.response_sha256,
    cert_chain_hash: meta.cert_chain_sha256,
    notary_pubkey: meta.notary_pubkey,
    signature: meta.signature,
  };
}

export function proofToMetadata(proof: RecordedTlsProof): TlsFixtureMetadata {
  return {
    domain: proof.domain,
    timestamp: proof.timestamp,
    response_sha256: proof.response_hash,
    cert_chain_sha256: proof.cert_chain_hash,
    notary_pubkey: proof.notary_pubkey,
    signature: proof.signature,
  };
}

function readRequired(dir: string, file: string): Buffer {
  const path = join(dir, file);
  if (!existsSync(path)) {
    throw new FixtureError(file, `not found in ${dir}`);
  }
  return readFileSync(path);
}

export function loadTlsFixture(dir: string): TlsFixture {
  const rawMeta = readRequired(dir, METADATA_FILE).toString("utf-8");
  let json: unknown;
  try {
    json = JSON.parse(rawMeta);
  } catch {
    throw new FixtureError(METADATA_FILE, "is not valid JSON");
  }
  const parsed = TlsFixtureMetadataSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ");
    throw new FixtureError(METADATA_FILE, `invalid fields: ${fields}`);
  }

  return {
    proof: metadataToProof(parsed.data),
    certChain: new Uint8Array(readRequired(dir, CERT_CHAIN_FILE)),
    responseBody: new Uint8Array(readRequired(dir, RESPONSE_BODY_FILE)),
  };
}

export function writeTlsFixture(dir: string, fixture: TlsFixture): void {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, METADATA_FILE), JSON.stringify(proofToMetadata(fixture.proof), null, 2), "utf-8");
  writeFileSync(join(dir, CERT_CHAIN_FILE), fixture.certChain);
  writeFileSync(join(dir, RESPONSE_BODY_FILE), fixture.responseBody);
}
