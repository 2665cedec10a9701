/**
 * STLOP notary: signs salary assertions so an EVM contract can check them with ecrecover.
 *
 * messageHash = keccak256(abi.encodePacked(address employee, uint256 salary, uint256 timestamp))
 * signature   = personal_sign(messageHash)  (EIP-191 "\x19Ethereum Signed Message:\n32" prefix)
 */

import { encodePacked, getAddress, isAddressEqual, keccak256, recoverMessageAddress, type Address } from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { NotaryError } from "./errors.js";
import type { Hex, STLOPProof } from "./types.js";

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const PRIVATE_KEY_RE = /^[0-9a-fA-F]{64}$/;
const DECIMAL_RE = /^\d+$/;
const UINT256_MAX = 2n ** 256n - 1n;

/** Placeholder payroll figure until a payroll integration provides real salaries. */
export const PLACEHOLDER_SALARY = "75000";

export interface SalarySource {
  salaryFor(employee: Address): Promise<string> | string;
}

export class FixedSalarySource implements SalarySource {
  constructor(private readonly salary: string = PLACEHOLDER_SALARY) {}

  salaryFor(): string {
    return this.salary;
  }
}

export type NotarySignerOptions = {
  salarySource?: SalarySource;
  /** Unix seconds. */
  clock?: () => number;
};

export function isValidAddress(s: string): boolean {
  return ADDRESS_RE.test(s);
}

/** Any-case address to checksummed form. */
export function parseAddress(address: string): Address {
  if (!isValidAddress(address)) {
    throw new NotaryError("INVALID_ADDRESS", "Expected 0x-prefixed 40-character hex address");
  }
  return getAddress(address.toLowerCase());
}

function toUint256(value: string | bigint | number, field: string): bigint {
  let n: bigint;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new NotaryError("SIGNING_FAILED", `${field} must be an integer`);
    }
    n = BigInt(value);
  } else {
    if (!DECIMAL_RE.test(value)) {
      throw new NotaryError("SIGNING_FAILED", `${field} must be a decimal integer string`);
    }
    n = BigInt(value);
  }
  if (n < 0n || n > UINT256_MAX) {
    throw new NotaryError("SIGNING_FAILED", `${field} is outside the uint256 range`);
  }
  return n;
}

/** The 84 packed bytes: address(20) ‖ salary uint256 BE(32) ‖ timestamp uint256 BE(32). */
export function packStlopMessage(employee: string, salary: string | bigint, timestamp: number | bigint): Hex {
  return encodePacked(
    ["address", "uint256", "uint256"],
    [parseAddress(employee), toUint256(salary, "salary"), toUint256(timestamp, "timestamp")]
  );
}

export function createMessageHash(employee: string, salary: string | bigint, timestamp: number | bigint): Hex {
  return keccak256(packStlopMessage(employee, salary, timestamp));
}

function normalizePrivateKey(privateKeyHex: string): Hex {
  const raw = privateKeyHex.startsWith("0x") ? privateKeyHex.slice(2) : privateKeyHex;
  if (!PRIVATE_KEY_RE.test(raw)) {
    throw new NotaryError("INVALID_PRIVATE_KEY", "Private key must be 32 bytes of hex");
  }
  return `0x${raw.toLowerCase()}`;
}

function accountFromKey(privateKeyHex: string): PrivateKeyAccount {
  const key = normalizePrivateKey(privateKeyHex);
  try {
    return privateKeyToAccount(key);
  } catch (e) {
    // zero or >= curve order
    throw new NotaryError("INVALID_PRIVATE_KEY", "Private key is not a valid secp256k1 scalar", { cause: e });
  }
}

export class NotarySigner {
  private readonly account: PrivateKeyAccount;
  private readonly salarySource: SalarySource;
  private readonly clock: () => number;

  constructor(privateKeyHex: string, options: NotarySignerOptions = {}) {
    this.account = accountFromKey(privateKeyHex);
    this.salarySource = options.salarySource ?? new FixedSalarySource();
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
  }

  get address(): Address {
    return this.account.address;
  }

  async generateProof(employeeAddress: string): Promise<STLOPProof> {
    const employee = parseAddress(employeeAddress);
    const salary = await this.salarySource.salaryFor(employee);
    const timestamp = this.clock();
    const messageHash = createMessageHash(employee, salary, timestamp);

    let signature: Hex;
    try {
      signature = await this.account.signMessage({ message: { raw: messageHash } });
    } catch (e) {
      throw new NotaryError("SIGNING_FAILED", "ECDSA signing failed", { cause: e });
    }

    return {
      salary,
      timestamp,
      signature,
      notary_pubkey: this.account.address,
    };
  }
}

/** Off-chain replay of the contract's ecrecover over the prefixed message hash. */
export async function recoverStlopSigner(employee: string, proof: STLOPProof): Promise<Address> {
  const messageHash = createMessageHash(employee, proof.salary, proof.timestamp);
  return recoverMessageAddress({ message: { raw: messageHash }, signature: proof.signature });
}

export async function verifyStlopProof(employee: string, proof: STLOPProof, expectedNotary: string): Promise<boolean> {
  try {
    const recovered = await recoverStlopSigner(employee, proof);
    return isAddressEqual(recovered, parseAddress(expectedNotary));
  } catch {
    return false;
  }
}
