/**
 * Pattern-based balance extraction from statement text.
 * PII is redacted before any field is read; the source hash covers the raw text.
 */

import { ExtractionError } from "./errors.js";
import { sha256, utf8 } from "./hash.js";

const PII_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/\d{3}-\d{2}-\d{4}/g, "[SSN REDACTED]"],
  [/account\s*#?\s*(\d{8,})/gi, "Account [REDACTED]"],
  [/\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}/g, "[CARD REDACTED]"],
];

const BALANCE_RE = /(?:balance|total|amount)[\s:$]*([0-9,]+\.?\d{0,2})/i;
const DATE_RE = /\d{4}-\d{2}-\d{2}|\d{2}\/\d{2}\/\d{4}/;
const AMOUNT_RE = /^(\d+)(?:\.(\d{0,2}))?$/;

export const KNOWN_INSTITUTIONS = ["Chase", "Bank of America", "Wells Fargo", "Citi", "Goldman Sachs"] as const;

export type StatementExtraction = {
  /** Cents. */
  balance: bigint;
  institution: string | null;
  date: string | null;
  confidence: number;
  warnings: string[];
  sourceHash: Uint8Array;
  redactedText: string;
};

export function redactPii(text: string): string {
  return PII_PATTERNS.reduce((acc, [re, replacement]) => acc.replace(re, replacement), text);
}

/** "50,000.00" → 5000000n. Whole dollars and up to two fraction digits. */
export function parseDollarsToCents(figure: string): bigint {
  const match = AMOUNT_RE.exec(figure.replaceAll(",", ""));
  if (!match) {
    throw new ExtractionError("INVALID_BALANCE", `Invalid balance format: ${figure}`);
  }
  const [, whole, fraction = ""] = match;
  return BigInt(whole) * 100n + BigInt(fraction.padEnd(2, "0"));
}

function findInstitution(text: string): string | null {
  return KNOWN_INSTITUTIONS.find((name) => text.includes(name)) ?? null;
}

export function extractBalanceStatement(text: string): StatementExtraction {
  const redactedText = redactPii(text);

  const match = BALANCE_RE.exec(redactedText);
  if (!match) {
    throw new ExtractionError("BALANCE_NOT_FOUND", "Balance not found in document");
  }
  const balance = parseDollarsToCents(match[1]);

  const institution = findInstitution(redactedText);
  const date = DATE_RE.exec(redactedText)?.[0] ?? null;

  let confidence = 1.0;
  const warnings: string[] = [];
  if (institution === null) {
    confidence *= 0.8;
    warnings.push("Institution name not found in document");
  }
  if (date === null) {
    confidence *= 0.9;
    warnings.push("Statement date not found");
  }

  return {
    balance,
    institution,
    date,
    confidence,
    warnings,
    sourceHash: sha256(utf8(text)),
    redactedText,
  };
}
