/**
 * Typed failures, one closed code set per protocol.
 * Messages carry field names and public values only, never key material or secret bytes.
 */

export type ZkTlsFailure =
  | { code: "DOMAIN_MISMATCH"; expected: string; got: string }
  | { code: "REPLAY_DETECTED"; timestamp: number; maxAge: number }
  | { code: "TIMESTAMP_IN_FUTURE"; timestamp: number; currentTime: number; skew: number }
  | { code: "CERT_CHAIN_MISMATCH" }
  | { code: "RESPONSE_TAMPERED" }
  | { code: "SIGNATURE_INVALID"; reason: string };

export type ZkTlsErrorCode = ZkTlsFailure["code"];

function describeTlsFailure(failure: ZkTlsFailure): string {
  switch (failure.code) {
    case "DOMAIN_MISMATCH":
      return `Domain mismatch: expected ${failure.expected}, got ${failure.got}`;
    case "REPLAY_DETECTED":
      return `Replay detected: proof timestamp ${failure.timestamp} is too old (max age ${failure.maxAge}s)`;
    case "TIMESTAMP_IN_FUTURE":
      return `Proof timestamp ${failure.timestamp} is more than ${failure.skew}s ahead of ${failure.currentTime}`;
    case "CERT_CHAIN_MISMATCH":
      return "Certificate chain mismatch";
    case "RESPONSE_TAMPERED":
      return "Response body hash mismatch / integrity failure";
    case "SIGNATURE_INVALID":
      return `Notary signature invalid: ${failure.reason}`;
  }
}

export class ZkTlsError extends Error {
  readonly failure: ZkTlsFailure;

  constructor(failure: ZkTlsFailure) {
    super(describeTlsFailure(failure));
    this.name = "ZkTlsError";
    this.failure = failure;
  }

  get code(): ZkTlsErrorCode {
    return this.failure.code;
  }
}

export type NotaryErrorCode = "INVALID_PRIVATE_KEY" | "INVALID_ADDRESS" | "SIGNING_FAILED";

export class NotaryError extends Error {
  readonly code: NotaryErrorCode;

  constructor(code: NotaryErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotaryError";
    this.code = code;
  }
}

/** Structural claim errors that block proving; warnings are reported separately. */
export class ClaimValidationError extends Error {
  readonly code = "CLAIM_INVALID";
  readonly errors: readonly string[];
  readonly warnings: readonly string[];

  constructor(errors: readonly string[], warnings: readonly string[]) {
    super(`Claim validation failed: ${errors.join("; ")}`);
    this.name = "ClaimValidationError";
    this.errors = errors;
    this.warnings = warnings;
  }
}

export type ExtractionErrorCode = "BALANCE_NOT_FOUND" | "INVALID_BALANCE";

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string) {
    super(message);
    this.name = "ExtractionError";
    this.code = code;
  }
}

export class FixtureError extends Error {
  readonly code = "FIXTURE_INVALID";
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "FixtureError";
    this.file = file;
  }
}

export type ProverErrorCode = "UNSUPPORTED_BACKEND" | "PROVING_FAILED" | "INVALID_INPUT";

export class ProverError extends Error {
  readonly code: ProverErrorCode;

  constructor(code: ProverErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProverError";
    this.code = code;
  }
}
