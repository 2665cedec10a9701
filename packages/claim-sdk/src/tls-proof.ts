/**
 * Recorded TLS proofs: a notary-signed assertion that a response body and
 * certificate chain were observed from a domain at a given time.
 *
 * Canonical signed message: "{domain}:{timestamp}:{response_hash}:{cert_chain_hash}" (UTF-8).
 */

import { ed25519Sign, ed25519Verify, type Ed25519KeyPair } from "./ed25519.js";
import { ZkTlsError } from "./errors.js";
import { bytesToHex, hexToBytes, sha256Hex, utf8 } from "./hash.js";
import type { RecordedTlsProof } from "./types.js";

/** Tolerated clock skew for proofs stamped ahead of the verifier's clock. */
export const FUTURE_SKEW_SECONDS = 300;

export type TlsVerifyParams = {
  expectedDomain: string;
  certChain: Uint8Array;
  responseBody: Uint8Array;
  currentTime: number;
  maxAgeSeconds: number;
};

export type TlsVerifyResult = { valid: true } | { valid: false; error: ZkTlsError };

export type TlsCapture = {
  domain: string;
  timestamp: number;
  certChain: Uint8Array;
  responseBody: Uint8Array;
};

export function canonicalTlsMessage(
  proof: Pick<RecordedTlsProof, "domain" | "timestamp" | "response_hash" | "cert_chain_hash">
): string {
  return `${proof.domain}:${proof.timestamp}:${proof.response_hash}:${proof.cert_chain_hash}`;
}

function fail(error: ZkTlsError): TlsVerifyResult {
  return { valid: false, error };
}

function checkSignature(proof: RecordedTlsProof): string | null {
  let publicKey: Uint8Array;
  let signature: Uint8Array;
  try {
    publicKey = hexToBytes(proof.notary_pubkey, 32);
  } catch (e) {
    return `notary_pubkey: ${e instanceof Error ? e.message : "undecodable"}`;
  }
  try {
    signature = hexToBytes(proof.signature, 64);
  } catch (e) {
    return `signature: ${e instanceof Error ? e.message : "undecodable"}`;
  }

  const message = utf8(canonicalTlsMessage(proof));
  try {
    return ed25519Verify(signature, message, publicKey) ? null : "signature does not match notary_pubkey";
  } catch (e) {
    return `verification error: ${e instanceof Error ? e.message : String(e)}`;
  }
}

/**
 * Verify a recorded proof against the caller's expectations and the original bytes.
 * Checks run in a fixed order and the first failure is returned.
 * Throws RangeError when `currentTime` or `maxAgeSeconds` is not a finite number.
 */
export function verifyRecordedTlsProof(proof: RecordedTlsProof, params: TlsVerifyParams): TlsVerifyResult {
  const { expectedDomain, certChain, responseBody, currentTime, maxAgeSeconds } = params;
  if (!Number.isFinite(currentTime)) {
    throw new RangeError(`currentTime must be a finite number of seconds, got ${currentTime}`);
  }
  if (!Number.isFinite(maxAgeSeconds) || maxAgeSeconds < 0) {
    throw new RangeError(`maxAgeSeconds must be a finite non-negative number, got ${maxAgeSeconds}`);
  }

  if (proof.domain !== expectedDomain) {
    return fail(new ZkTlsError({ code: "DOMAIN_MISMATCH", expected: expectedDomain, got: proof.domain }));
  }

  if (currentTime > proof.timestamp + maxAgeSeconds) {
    return fail(new ZkTlsError({ code: "REPLAY_DETECTED", timestamp: proof.timestamp, maxAge: maxAgeSeconds }));
  }

  if (proof.timestamp > currentTime + FUTURE_SKEW_SECONDS) {
    return fail(
      new ZkTlsError({
        code: "TIMESTAMP_IN_FUTURE",
        timestamp: proof.timestamp,
        currentTime,
        skew: FUTURE_SKEW_SECONDS,
      })
    );
  }

  if (sha256Hex(certChain) !== proof.cert_chain_hash.toLowerCase()) {
    return fail(new ZkTlsError({ code: "CERT_CHAIN_MISMATCH" }));
  }

  if (sha256Hex(responseBody) !== proof.response_hash.toLowerCase()) {
    return fail(new ZkTlsError({ code: "RESPONSE_TAMPERED" }));
  }

  const reason = checkSignature(proof);
  if (reason !== null) {
    return fail(new ZkTlsError({ code: "SIGNATURE_INVALID", reason }));
  }

  return { valid: true };
}

/** Notary side: hash the captured bytes and sign the canonical message. */
export function signRecordedTlsProof(capture: TlsCapture, notary: Ed25519KeyPair): RecordedTlsProof {
  if (!Number.isSafeInteger(capture.timestamp) || capture.timestamp < 0) {
    throw new RangeError("timestamp must be a non-negative integer of seconds");
  }
  const fields = {
    domain: capture.domain,
    timestamp: capture.timestamp,
    response_hash: sha256Hex(capture.responseBody),
    cert_chain_hash: sha256Hex(capture.certChain),
  };
  const signature = ed25519Sign(utf8(canonicalTlsMessage(fields)), notary.privateKey);
  return {
    ...fields,
    notary_pubkey: bytesToHex(notary.publicKey),
    signature: bytesToHex(signature),
  };
}
