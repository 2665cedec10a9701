/**
 * Institutional real-world-asset claims.
 *
 * The institution signs balance.to_le_bytes() (8 bytes) with Ed25519. This is
 * independent of the STLOP notary's big-endian / ECDSA convention.
 */

import { ed25519Sign, ed25519Verify, generateEd25519KeyPair, type Ed25519KeyPair } from "./ed25519.js";
import { concatBytes, sha256, u32LE, u64LE } from "./hash.js";
import { buildMerkleProof, verifyMerkleProof } from "./merkle.js";
import type { RwaClaim, RwaClaimWithProof, RwaPublicValues } from "./types.js";

export function isClaimWithProof(claim: RwaClaim): claim is RwaClaimWithProof {
  return "merkle_root" in claim && "merkle_proof" in claim && "leaf_index" in claim && "tree_size" in claim;
}

export function messageToSign(claim: Pick<RwaClaim, "balance">): Uint8Array {
  return u64LE(claim.balance);
}

export function signBalance(privateKey: Uint8Array, balance: bigint): Uint8Array {
  return ed25519Sign(u64LE(balance), privateKey);
}

export function verifyClaimSignature(claim: RwaClaim): boolean {
  if (claim.institutional_pubkey.length !== 32 || claim.signature.length !== 64) return false;
  try {
    return ed25519Verify(claim.signature, messageToSign(claim), claim.institutional_pubkey);
  } catch {
    return false;
  }
}

/** Ledger leaf for a balance: sha256(u64 LE). */
export function balanceLeaf(balance: bigint): Uint8Array {
  return sha256(u64LE(balance));
}

export function isCompliant(claim: Pick<RwaClaim, "balance" | "threshold">): boolean {
  return claim.balance >= claim.threshold;
}

export function verifyClaimInclusion(claim: RwaClaimWithProof): boolean {
  return verifyMerkleProof(
    claim.merkle_root,
    claim.merkle_proof,
    balanceLeaf(claim.balance),
    claim.leaf_index,
    claim.tree_size
  );
}

export function rwaPublicValues(claim: RwaClaim): RwaPublicValues {
  const values: RwaPublicValues = {
    institutional_pubkey: claim.institutional_pubkey,
    threshold: claim.threshold,
  };
  if (isClaimWithProof(claim)) values.merkle_root = claim.merkle_root;
  return values;
}

/** pubkey(32) ‖ threshold u64 LE [‖ merkle_root(32)] */
export function encodeRwaPublicValues(values: RwaPublicValues): Uint8Array {
  const parts = [values.institutional_pubkey, u64LE(values.threshold)];
  if (values.merkle_root) parts.push(values.merkle_root);
  return concatBytes(...parts);
}

/**
 * Private prover input, little-endian fixed layout:
 * pubkey(32) ‖ balance u64 ‖ threshold u64 ‖ signature(64)
 * then for the Merkle variant: root(32) ‖ u32 count ‖ count × 32 ‖ leaf_index u64
 */
export function encodeRwaClaim(claim: RwaClaim): Uint8Array {
  const parts = [claim.institutional_pubkey, u64LE(claim.balance), u64LE(claim.threshold), claim.signature];
  if (isClaimWithProof(claim)) {
    parts.push(
      claim.merkle_root,
      u32LE(claim.merkle_proof.length),
      ...claim.merkle_proof,
      u64LE(BigInt(claim.leaf_index))
    );
  }
  return concatBytes(...parts);
}

/** Sample institutional ledger (cents); the user's balance is placed at `userIndex`. */
export const SAMPLE_LEDGER: readonly bigint[] = [
  5_000_000n,
  10_000_000n,
  7_500_000n,
  0n,
  2_000_000n,
  15_000_000n,
  3_000_000n,
  8_000_000n,
  1_000_000n,
  12_000_000n,
];

export type RwaCredentialParams = {
  balance: bigint;
  threshold: bigint;
  ledger?: readonly bigint[];
  userIndex?: number;
  institution?: Ed25519KeyPair;
};

export type RwaCredentials = {
  claim: RwaClaimWithProof;
  institution: Ed25519KeyPair;
};

/** Sign the user's balance and prove its inclusion in the institution's ledger tree. */
export function generateRwaCredentials(params: RwaCredentialParams): RwaCredentials {
  const userIndex = params.userIndex ?? 3;
  const ledger = [...(params.ledger ?? SAMPLE_LEDGER)];
  if (!Number.isInteger(userIndex) || userIndex < 0 || userIndex >= ledger.length) {
    throw new RangeError(`userIndex ${userIndex} outside ledger of ${ledger.length} accounts`);
  }
  ledger[userIndex] = params.balance;

  const institution = params.institution ?? generateEd25519KeyPair();
  const proof = buildMerkleProof(ledger.map(balanceLeaf), userIndex);

  return {
    claim: {
      institutional_pubkey: institution.publicKey,
      balance: params.balance,
      threshold: params.threshold,
      signature: signBalance(institution.privateKey, params.balance),
      merkle_root: proof.root,
      merkle_proof: proof.auditPath,
      leaf_index: userIndex,
      tree_size: ledger.length,
    },
    institution,
  };
}
