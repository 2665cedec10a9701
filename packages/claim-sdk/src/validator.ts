/**
 * Structural pre-checks before a claim is handed to the prover.
 * Errors block the claim; warnings are advisory.
 */

import { isAllZero } from "./hash.js";
import { isClaimWithProof, verifyClaimInclusion } from "./rwa.js";
import type { RwaClaim, RwaClaimWithProof } from "./types.js";

/** $1B in cents. */
export const LARGE_BALANCE_WARNING = 100_000_000_000n;

export type ValidationResult = {
  isValid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateRwaClaim(claim: RwaClaim | RwaClaimWithProof): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (claim.balance === 0n) {
    errors.push("Balance cannot be zero");
  }

  if (claim.threshold > claim.balance) {
    errors.push("Threshold cannot exceed balance");
  }

  if (claim.institutional_pubkey.length !== 32) {
    errors.push("Institutional pubkey must be 32 bytes");
  } else if (isAllZero(claim.institutional_pubkey)) {
    warnings.push("Institutional pubkey appears to be placeholder");
  }

  if (claim.signature.length !== 64) {
    errors.push("Signature must be 64 bytes");
  } else if (isAllZero(claim.signature)) {
    warnings.push("Signature appears to be placeholder");
  }

  if (claim.balance > LARGE_BALANCE_WARNING) {
    warnings.push("Balance exceeds $1 billion - please verify");
  }

  if (isClaimWithProof(claim) && !verifyClaimInclusion(claim)) {
    errors.push("Merkle inclusion proof does not match merkle_root");
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
