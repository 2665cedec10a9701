/**
 * File-level operations behind the claim-tools CLI. Each returns what it did
 * so the CLI can print it and tests can assert on it.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  ClaimPipeline,
  MockProver,
  ZkAuditTrail,
  encodeRwaClaim,
  generateEd25519KeyPair,
  generateRwaCredentials,
  isCompliant,
  jsonlFileSink,
  loadTlsFixture,
  signRecordedTlsProof,
  utf8,
  verifyRecordedTlsProof,
  writeTlsFixture,
  type Ed25519KeyPair,
  type RecordedTlsProof,
  type RwaCredentials,
  type StatementExtraction,
  type TlsVerifyResult,
} from "@attestkit/claim-sdk";

export const DEMO_DOMAIN = "example.com";
export const DEMO_TIMESTAMP = 1735128000;
export const DEMO_CERT_CHAIN = "-----BEGIN CERTIFICATE-----\nMOCK_CERT_CHAIN_FOR_DEMO\n-----END CERTIFICATE-----";
export const DEMO_RESPONSE = {
  data: {
    balance: 5000,
    currency: "USD",
    last_updated_ts: 1735230000,
  },
};

export type CaptureOptions = {
  outDir: string;
  domain?: string;
  timestamp?: number;
  certChain?: string;
  responseBody?: string;
  notary?: Ed25519KeyPair;
};

/** Sign a captured (or demo) TLS session as a local notary and write the fixture triple. */
export function captureTls(options: CaptureOptions): RecordedTlsProof {
  const certChain = utf8(options.certChain ?? DEMO_CERT_CHAIN);
  const responseBody = utf8(options.responseBody ?? JSON.stringify(DEMO_RESPONSE, null, 2));
  const proof = signRecordedTlsProof(
    {
      domain: options.domain ?? DEMO_DOMAIN,
      timestamp: options.timestamp ?? DEMO_TIMESTAMP,
      certChain,
      responseBody,
    },
    options.notary ?? generateEd25519KeyPair()
  );
  writeTlsFixture(options.outDir, { proof, certChain, responseBody });
  return proof;
}

export type VerifyFixtureOptions = {
  dir: string;
  domain: string;
  /** Unix seconds. */
  currentTime: number;
  maxAgeSeconds: number;
};

export function verifyTlsFixture(options: VerifyFixtureOptions): TlsVerifyResult {
  const fixture = loadTlsFixture(options.dir);
  return verifyRecordedTlsProof(fixture.proof, {
    expectedDomain: options.domain,
    certChain: fixture.certChain,
    responseBody: fixture.responseBody,
    currentTime: options.currentTime,
    maxAgeSeconds: options.maxAgeSeconds,
  });
}

export type RwaInputsOptions = {
  output: string;
  balance: bigint;
  threshold: bigint;
  institution?: Ed25519KeyPair;
};

export type RwaInputsResult = RwaCredentials & {
  compliant: boolean;
  bytesWritten: number;
};

/** Write the private prover input for a signed, ledger-included balance. */
export function generateRwaInputs(options: RwaInputsOptions): RwaInputsResult {
  const creds = generateRwaCredentials({
    balance: options.balance,
    threshold: options.threshold,
    institution: options.institution,
  });
  const encoded = encodeRwaClaim(creds.claim);
  const dir = dirname(options.output);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(options.output, encoded);
  return { ...creds, compliant: isCompliant(creds.claim), bytesWritten: encoded.length };
}

export type AuditCheck = {
  entries: number;
  trailHash: string;
  valid: boolean;
};

export function verifyAuditFile(path: string): AuditCheck {
  const json: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const trail = ZkAuditTrail.fromJSON(json);
  return { entries: trail.length, trailHash: trail.trailHash, valid: trail.verifyIntegrity() };
}

export type ExtractOptions = {
  input: string;
  /** Exported trail; written after extraction. */
  auditOut?: string;
  /** JSON Lines log, appended per entry. */
  auditLog?: string;
};

export function extractStatementFile(options: ExtractOptions): StatementExtraction {
  const trail = new ZkAuditTrail({ sink: options.auditLog ? jsonlFileSink(options.auditLog) : undefined });
  const pipeline = new ClaimPipeline(new MockProver(), trail);
  const extraction = pipeline.extractClaim(readFileSync(options.input, "utf-8"));
  if (options.auditOut) {
    writeFileSync(options.auditOut, trail.exportJson(), "utf-8");
  }
  return extraction;
}
