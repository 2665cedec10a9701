/**
 * attestkit claim SDK: recorded TLS proofs, STLOP salary attestations,
 * institutional RWA claims, the hash-chained audit trail and prover input assembly.
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./hash.js";
export * from "./ed25519.js";
export * from "./tls-proof.js";
export * from "./fixtures.js";
export * from "./stlop.js";
export * from "./merkle.js";
export * from "./rwa.js";
export * from "./validator.js";
export * from "./audit.js";
export * from "./input-builder.js";
export * from "./prover.js";
export * from "./extractor.js";
export * from "./pipeline.js";
