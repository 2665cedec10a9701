import * as ed from "@noble/ed25519";
import { sha512 } from "@noble/hashes/sha512";
import { concatBytes } from "@noble/hashes/utils";

// Sync API needs an explicit sha512.
ed.etc.sha512Sync = (...m) => sha512(concatBytes(...m));

export type Ed25519KeyPair = {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
};

export function generateEd25519KeyPair(): Ed25519KeyPair {
  const privateKey = ed.utils.randomPrivateKey();
  return { privateKey, publicKey: ed.getPublicKey(privateKey) };
}

export function ed25519KeyPairFromSeed(seed: Uint8Array): Ed25519KeyPair {
  if (seed.length !== 32) throw new Error("Ed25519 seed must be 32 bytes");
  return { privateKey: seed, publicKey: ed.getPublicKey(seed) };
}

export function ed25519Sign(message: Uint8Array, privateKey: Uint8Array): Uint8Array {
  return ed.sign(message, privateKey);
}

/** Throws on malformed inputs; returns false for a well-formed but wrong signature. */
export function ed25519Verify(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): boolean {
  return ed.verify(signature, message, publicKey);
}
