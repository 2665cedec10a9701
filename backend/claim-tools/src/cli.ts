#!/usr/bin/env node
/**
 * claim-tools CLI: capture and verify recorded TLS fixtures, generate RWA
 * prover inputs, extract statements and check exported audit trails.
 *
 * Usage:
 *   npm run claim-tools -- capture-tls --out-dir fixtures/zktls
 *   npm run claim-tools -- verify-tls --dir fixtures/zktls --max-age 3600
 *   npm run claim-tools -- rwa-inputs --balance 150000000 --threshold 100000000
 */

import { bytesToHex } from "@attestkit/claim-sdk";
import { Command, InvalidArgumentError } from "commander";
import {
  captureTls,
  extractStatementFile,
  generateRwaInputs,
  verifyAuditFile,
  verifyTlsFixture,
  type RwaInputsResult,
} from "./commands.js";

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Expected a non-negative integer.");
  const n = Number(value);
  if (!Number.isSafeInteger(n)) throw new InvalidArgumentError("Integer is too large.");
  return n;
}

function parseCents(value: string): bigint {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Expected an amount in integer cents.");
  return BigInt(value);
}

function dollars(cents: bigint): string {
  return `$${cents / 100n}.${String(cents % 100n).padStart(2, "0")}`;
}

function printRwaSummary(result: RwaInputsResult, output: string): void {
  const { claim } = result;
  console.log(`Institutional public key: ${bytesToHex(claim.institutional_pubkey)}`);
  console.log(`Balance: ${dollars(claim.balance)}`);
  console.log(`Threshold: ${dollars(claim.threshold)}`);
  console.log(`Compliance: ${result.compliant ? "PASS" : "FAIL"}`);
  console.log(`Total accounts: ${claim.tree_size}`);
  console.log(`Merkle root: ${bytesToHex(claim.merkle_root)}`);
  console.log(`User index: ${claim.leaf_index}`);
  console.log(`Proof length: ${claim.merkle_proof.length} hashes`);
  console.log(`Wrote ${result.bytesWritten} bytes to ${output}`);
}

const program = new Command();

program
  .name("claim-tools")
  .description("Recorded TLS fixtures, RWA credentials and audit trail checks");

program
  .command("capture-tls")
  .description("Sign a demo TLS session as a local notary and write the fixture triple")
  .option("--out-dir <path>", "Fixture directory", "fixtures/zktls")
  .option("--domain <domain>", "Domain the session was captured from", "example.com")
  .option("--timestamp <seconds>", "Capture time (unix seconds)", parseInteger, 1735128000)
  .action((opts: { outDir: string; domain: string; timestamp: number }) => {
    console.log(`Generating proof for ${opts.domain}`);
    const proof = captureTls({ outDir: opts.outDir, domain: opts.domain, timestamp: opts.timestamp });
    console.log(`Local notary public key: ${proof.notary_pubkey}`);
    console.log(`Fixtures written to ${opts.outDir}`);
    console.log("  - metadata.json");
    console.log("  - response_body.json");
    console.log("  - cert_chain.pem");
  });

program
  .command("verify-tls")
  .description("Verify a fixture triple against a domain and freshness window")
  .option("--dir <path>", "Fixture directory", "fixtures/zktls")
  .option("--domain <domain>", "Expected domain", "example.com")
  .option("--max-age <seconds>", "Maximum proof age", parseInteger, 3600)
  .option("--now <seconds>", "Verifier clock (unix seconds); defaults to the system clock", parseInteger)
  .action((opts: { dir: string; domain: string; maxAge: number; now?: number }) => {
    const currentTime = opts.now ?? Math.floor(Date.now() / 1000);
    const result = verifyTlsFixture({
      dir: opts.dir,
      domain: opts.domain,
      currentTime,
      maxAgeSeconds: opts.maxAge,
    });
    if (result.valid) {
      console.log(`Proof valid for ${opts.domain} at ${currentTime}`);
      return;
    }
    console.error(`[${result.error.code}] ${result.error.message}`);
    process.exitCode = 1;
  });

program
  .command("rwa-inputs")
  .description("Generate signed RWA credentials with a ledger inclusion proof")
  .option("-o, --output <path>", "Binary prover input", "rwa_creds.bin")
  .option("-b, --balance <cents>", "User balance in cents", parseCents, 150_000_000n)
  .option("-t, --threshold <cents>", "Compliance threshold in cents", parseCents, 100_000_000n)
  .action((opts: { output: string; balance: bigint; threshold: bigint }) => {
    const result = generateRwaInputs(opts);
    printRwaSummary(result, opts.output);
  });

program
  .command("extract")
  .description("Extract a balance claim from statement text")
  .argument("<file>", "Statement text file")
  .option("--audit-out <path>", "Write the audit trail JSON here")
  .option("--audit-log <path>", "Append audit entries as JSON Lines")
  .action((file: string, opts: { auditOut?: string; auditLog?: string }) => {
    const extraction = extractStatementFile({ input: file, ...opts });
    console.log(`Balance: ${dollars(extraction.balance)}`);
    console.log(`Institution: ${extraction.institution ?? "unknown"}`);
    console.log(`Date: ${extraction.date ?? "unknown"}`);
    console.log(`Confidence: ${extraction.confidence.toFixed(2)}`);
    for (const warning of extraction.warnings) console.warn(`Warning: ${warning}`);
  });

program
  .command("verify-audit")
  .description("Check the hash chain of an exported audit trail")
  .argument("<file>", "Audit trail JSON")
  .action((file: string) => {
    const check = verifyAuditFile(file);
    console.log(`Entries: ${check.entries}`);
    console.log(`Trail hash: ${check.trailHash}`);
    if (check.valid) {
      console.log("Integrity: OK");
    } else {
      console.error("Integrity: FAILED");
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
