/**
 * Banking guard - financial app blocklist and financial text detection
 *
 * Identifiers on the blocklist are matched exactly, as globs, or as a
 * prefix of a longer package id (e.g. "com.phonepe.app.v4").
 */

import { readFileSync } from "node:fs";
import { minimatch } from "minimatch";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";

const log = createLogger("banking-guard");

const bankingDataSchema = z.object({
  apps: z.array(z.string()),
  appNames: z.array(z.string()),
  upiKeywords: z.array(z.string()),
});

export type BankingData = z.infer<typeof bankingDataSchema>;

const BUNDLED_DATA_URL = new URL("../../data/banking-apps.json", import.meta.url);

export function loadBundledBankingData(): BankingData {
  const raw: unknown = JSON.parse(readFileSync(BUNDLED_DATA_URL, "utf-8"));
  return bankingDataSchema.parse(raw);
}

const FINANCIAL_TEXT_PATTERNS: RegExp[] = [
  /\b(?:rs|inr)\s*\.?\s*[\d,]+(?:\.\d{2})?/i,
  /\b(?:credited|debited|withdrawn|transferred)\b/i,
  /\b(?:account|a\/c|acct)\s*(?:no|number)?[:\s]*[x\d]+/i,
  /\b(?:available\s*balance|avl\s*bal|avlbl\s*bal)\b/i,
  /\bupi\s*(?:ref|reference|txn|transaction)\b/i,
  /\b(?:imps|neft|rtgs)\b/i,
  /\b(?:otp|one.?time.?password)\b/i,
];

// Order matters: card numbers must be replaced before bare account numbers.
const SENSITIVE_PATTERNS: Array<[label: string, pattern: RegExp]> = [
  ["CARD_NUMBER", /\b(?:\d{4}[-\s]?){3}\d{4}\b/g],
  ["CVV", /\bcvv[:\s]*\d{3,4}\b/gi],
  ["OTP", /\b(?:otp|pin)[:\s]*\d{4,6}\b/gi],
  ["IFSC", /\b[A-Z]{4}0[A-Z0-9]{6}\b/g],
  ["UPI_ID", /\b[\w.-]+@[a-z]+\b/gi],
  ["ACCOUNT_NUMBER", /\b\d{9,18}\b/g],
];

export interface FinancialScan {
  financial: boolean;
  patternMatches: number;
  keywords: string[];
}

export class BankingGuard {
  private readonly exact: Set<string>;
  private readonly globs: string[];
  private readonly appNames: string[];
  private readonly upiKeywords: string[];

  constructor(data: BankingData, extraBlocklist: string[] = []) {
    const ids = [...data.apps, ...extraBlocklist].map((id) => id.trim().toLowerCase()).filter(Boolean);
    this.exact = new Set(ids.filter((id) => !id.includes("*")));
    this.globs = ids.filter((id) => id.includes("*"));
    this.appNames = data.appNames.map((n) => n.toLowerCase());
    this.upiKeywords = data.upiKeywords.map((k) => k.toLowerCase());
  }

  /** Whether an app identifier (package id or display name) is a banking/payment app */
  isBankingApp(identifier: string): boolean {
    const id = identifier.trim().toLowerCase();
    if (!id) return false;
    if (this.exact.has(id)) return true;
    if (this.appNames.includes(id)) return true;
    if (this.globs.some((pattern) => minimatch(id, pattern, { nocase: true }))) return true;

    for (const blocked of this.exact) {
      if (id.startsWith(`${blocked}.`) || id.startsWith(`${blocked}:`)) return true;
    }
    return false;
  }

  scanText(text: string): FinancialScan {
    const lower = text.toLowerCase();
    const patternMatches = FINANCIAL_TEXT_PATTERNS.filter((p) => p.test(text)).length;
    const keywords = this.upiKeywords.filter((k) => lower.includes(k));
    const financial = patternMatches >= 2 || keywords.length > 0;
    if (financial) {
      log.warn(`Financial content detected (patterns=${patternMatches}, keywords=${keywords.length})`);
    }
    return { financial, patternMatches, keywords };
  }

  /** Replace card, OTP, IFSC, UPI id and account numbers with labelled placeholders */
  redact(text: string): string {
    return redactFinancialData(text);
  }

  blocklistSize(): number {
    return this.exact.size + this.globs.length;
  }
}

export function redactFinancialData(text: string): string {
  let out = text;
  for (const [label, pattern] of SENSITIVE_PATTERNS) {
    out = out.replace(pattern, `[${label}_REDACTED]`);
  }
  return out;
}
