/**
 * Claim protocol types.
 * Recorded TLS proofs, STLOP notary proofs, RWA claims, audit entries and prover receipts.
 */

export type Hex = `0x${string}`;

/**
 * Signed record that `response_hash` / `cert_chain_hash` were observed from
 * `domain` at `timestamp`. Hashes, key and signature are plain lowercase hex.
 */
export type RecordedTlsProof = {
  domain: string;
  timestamp: number;
  response_hash: string;
  cert_chain_hash: string;
  notary_pubkey: string;
  signature: string;
};

/** Signed TLS-Originated Proof of a salary figure, checked onchain via ecrecover. */
export type STLOPProof = {
  salary: string;
  timestamp: number;
  signature: Hex;
  notary_pubkey: Hex;
};

export type GenerateProofRequest = {
  employee_address: string;
};

export type HealthResponse = {
  status: "ok";
  notary_address: Hex;
};

export type RwaClaim = {
  institutional_pubkey: Uint8Array;
  balance: bigint;
  threshold: bigint;
  signature: Uint8Array;
};

export type RwaClaimWithProof = RwaClaim & {
  merkle_root: Uint8Array;
  merkle_proof: Uint8Array[];
  leaf_index: number;
  /** Leaves in the ledger tree; bounds `leaf_index`. */
  tree_size: number;
};

/** What the prover commits publicly. Balance and signature never appear here. */
export type RwaPublicValues = {
  institutional_pubkey: Uint8Array;
  threshold: bigint;
  merkle_root?: Uint8Array;
};

export const AUDIT_ACTIONS = [
  "extract-claim",
  "generate-proof",
  "submit-to-chain",
  "verify-proof",
  "export-verifier",
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export type AuditEntry = {
  readonly timestamp: number;
  readonly action: AuditAction;
  readonly input_hash: Hex;
  readonly output_hash: Hex;
  readonly decision_logic_hash: Hex;
  readonly confidence: number;
  readonly previous_hash: Hex;
  readonly nonce: number;
};

export type ChainType = "solana" | "stellar" | "evm";

export type ProofReceipt = {
  proof: Uint8Array;
  public_values: Uint8Array;
  metadata: Uint8Array;
};
