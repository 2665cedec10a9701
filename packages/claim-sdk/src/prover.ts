/**
 * Proving backend boundary. Real zkVM backends live outside this package;
 * the in-process mock keeps the pipeline and its tests runnable.
 */

import { ProverError } from "./errors.js";
import { bytesEqual, hexToBytes, utf8 } from "./hash.js";
import { publicSectionLength } from "./input-builder.js";
import type { ChainType, ProofReceipt } from "./types.js";

export interface PrivacyEngine {
  readonly name: string;
  prove(input: Uint8Array): Promise<ProofReceipt>;
  verify(receipt: ProofReceipt): Promise<boolean>;
  exportVerifier(chain: ChainType): Promise<Uint8Array>;
}

export const MOCK_PROOF = hexToBytes("cafebabe");
export const MOCK_METADATA = "mock-prover";

export class MockProver implements PrivacyEngine {
  readonly name = "mock";

  async prove(input: Uint8Array): Promise<ProofReceipt> {
    let end: number;
    try {
      end = publicSectionLength(input);
    } catch (e) {
      throw new ProverError("INVALID_INPUT", "Input is not an assembled claim input", { cause: e });
    }
    return {
      proof: Uint8Array.from(MOCK_PROOF),
      public_values: input.slice(0, end),
      metadata: utf8(MOCK_METADATA),
    };
  }

  async verify(receipt: ProofReceipt): Promise<boolean> {
    return bytesEqual(receipt.proof, MOCK_PROOF);
  }

  async exportVerifier(chain: ChainType): Promise<Uint8Array> {
    return utf8(`mock-verifier:${chain}`);
  }
}

export const PRIVACY_ENGINES = ["mock"] as const;
export type PrivacyEngineKind = (typeof PRIVACY_ENGINES)[number];

function isEngineKind(kind: string): kind is PrivacyEngineKind {
  return PRIVACY_ENGINES.some((k) => k === kind);
}

export function createPrivacyEngine(kind: string): PrivacyEngine {
  if (!isEngineKind(kind)) {
    throw new ProverError("UNSUPPORTED_BACKEND", `Unsupported proving backend: ${kind}`);
  }
  return new MockProver();
}
