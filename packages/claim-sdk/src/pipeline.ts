/**
 * Claim orchestration: source verification, extraction, validation, proving
 * and verifier export, each step recorded in the audit trail.
 */

import { ZkAuditTrail } from "./audit.js";
import { ClaimValidationError } from "./errors.js";
import { extractBalanceStatement, type StatementExtraction } from "./extractor.js";
import { concatBytes, u64LE, utf8 } from "./hash.js";
import { ClaimInputAssembler } from "./input-builder.js";
import type { PrivacyEngine } from "./prover.js";
import { encodeRwaClaim, encodeRwaPublicValues, rwaPublicValues } from "./rwa.js";
import { canonicalTlsMessage, verifyRecordedTlsProof, type TlsVerifyParams, type TlsVerifyResult } from "./tls-proof.js";
import type { ChainType, ProofReceipt, RecordedTlsProof, RwaClaim } from "./types.js";
import { validateRwaClaim, type ValidationResult } from "./validator.js";

/** Identifiers hashed into decision_logic_hash for each step. */
export const DECISION_LOGIC = {
  tlsVerify: "recorded-tls-verify:domain,replay,future,cert,response,signature",
  extract: "statement-extractor:regex",
  compliance: "rwa-compliance:balance>=threshold",
  receiptVerify: "receipt-verify",
  exportVerifier: "export-verifier",
} as const;

export type ComplianceResult = {
  receipt: ProofReceipt;
  validation: ValidationResult;
};

export class ClaimPipeline {
  readonly trail: ZkAuditTrail;

  constructor(
    private readonly engine: PrivacyEngine,
    trail?: ZkAuditTrail
  ) {
    this.trail = trail ?? new ZkAuditTrail();
  }

  verifyTlsSource(proof: RecordedTlsProof, params: TlsVerifyParams): TlsVerifyResult {
    const result = verifyRecordedTlsProof(proof, params);
    this.trail.addEntry(
      "verify-proof",
      utf8(canonicalTlsMessage(proof)),
      utf8(result.valid ? "valid" : result.error.code),
      utf8(DECISION_LOGIC.tlsVerify),
      1.0
    );
    return result;
  }

  extractClaim(text: string): StatementExtraction {
    const extraction = extractBalanceStatement(text);
    this.trail.addEntry(
      "extract-claim",
      extraction.sourceHash,
      u64LE(extraction.balance),
      utf8(DECISION_LOGIC.extract),
      extraction.confidence
    );
    return extraction;
  }

  /**
   * Validate, assemble and prove. Public input is the claim's public values;
   * the full claim encoding goes in as a secret.
   */
  async proveCompliance(claim: RwaClaim): Promise<ComplianceResult> {
    const validation = validateRwaClaim(claim);
    if (!validation.isValid) {
      throw new ClaimValidationError(validation.errors, validation.warnings);
    }

    const publicValues = encodeRwaPublicValues(rwaPublicValues(claim));
    const assembler = new ClaimInputAssembler().addPublicData(publicValues).addSecret(encodeRwaClaim(claim));
    const input = assembler.build();
    assembler.clear();

    let receipt: ProofReceipt;
    try {
      receipt = await this.engine.prove(input);
    } finally {
      input.fill(0);
    }

    this.trail.addEntry(
      "generate-proof",
      publicValues,
      concatBytes(receipt.proof, receipt.public_values),
      utf8(DECISION_LOGIC.compliance),
      1.0
    );
    return { receipt, validation };
  }

  async verifyReceipt(receipt: ProofReceipt): Promise<boolean> {
    const valid = await this.engine.verify(receipt);
    this.trail.addEntry(
      "verify-proof",
      concatBytes(receipt.proof, receipt.public_values),
      utf8(valid ? "valid" : "invalid"),
      utf8(DECISION_LOGIC.receiptVerify),
      1.0
    );
    return valid;
  }

  async exportVerifier(chain: ChainType): Promise<Uint8Array> {
    const verifier = await this.engine.exportVerifier(chain);
    this.trail.addEntry("export-verifier", utf8(chain), verifier, utf8(DECISION_LOGIC.exportVerifier), 1.0);
    return verifier;
  }
}
