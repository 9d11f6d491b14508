/**
 * Message importance scoring for forwarded WhatsApp messages
 *
 * score = contact (0.3) + urgent keywords (0.15 each, max 0.4)
 *       + time-sensitive (0.2) + question (0.1)
 * Important at >= 0.5. Two or more spam keywords make a message unimportant.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Contact } from "../calls/types.js";
import type { ReadItem } from "../readers/interface.js";

const importanceDataSchema = z.object({
  urgentKeywords: z.array(z.string()),
  spamKeywords: z.array(z.string()),
  timePatterns: z.array(z.string()),
});

export type ImportanceData = z.infer<typeof importanceDataSchema>;

const BUNDLED_DATA_URL = new URL("../../data/importance.json", import.meta.url);

export function loadBundledImportanceData(): ImportanceData {
  const raw: unknown = JSON.parse(readFileSync(BUNDLED_DATA_URL, "utf-8"));
  return importanceDataSchema.parse(raw);
}

export interface ImportanceResult {
  important: boolean;
  score: number;
  reasons: string[];
}

const IMPORTANT_THRESHOLD = 0.5;
const SPAM_THRESHOLD = 0.3;

export class ImportanceDetector {
  private readonly urgentKeywords: string[];
  private readonly spamKeywords: string[];
  private readonly timePatterns: RegExp[];
  private readonly contacts: Contact[];

  constructor(data: ImportanceData, contacts: Contact[] = []) {
    this.urgentKeywords = data.urgentKeywords.map((k) => k.toLowerCase());
    this.spamKeywords = data.spamKeywords.map((k) => k.toLowerCase());
    this.timePatterns = data.timePatterns.map((p) => new RegExp(p, "i"));
    this.contacts = contacts;
  }

  analyze(item: ReadItem): ImportanceResult {
    const text = item.text.toLowerCase();

    const spamScore = Math.min(1, this.spamKeywords.filter((k) => text.includes(k)).length / 5);
    if (spamScore > SPAM_THRESHOLD) {
      return { important: false, score: 0, reasons: ["spam"] };
    }

    let score = 0;
    const reasons: string[] = [];

    if (item.from && this.isKnownContact(item.from)) {
      score += 0.3;
      reasons.push("known_contact");
    }

    const keywords = this.urgentKeywords.filter((k) => text.includes(k));
    if (keywords.length > 0) {
      score += Math.min(0.4, keywords.length * 0.15);
      reasons.push(...keywords.slice(0, 3).map((k) => `keyword:${k}`));
    }

    if (this.timePatterns.some((p) => p.test(item.text))) {
      score += 0.2;
      reasons.push("time_sensitive");
    }

    if (item.text.includes("?")) {
      score += 0.1;
      reasons.push("question");
    }

    // Round away float noise (0.15 * 2 + 0.2 ...)
    score = Math.round(score * 100) / 100;
    return { important: score >= IMPORTANT_THRESHOLD, score: Math.min(1, score), reasons };
  }

  private isKnownContact(from: string): boolean {
    const sender = from.toLowerCase();
    const digits = from.replace(/[^\d+]/g, "");
    return this.contacts.some(
      (c) => (digits && c.number.replace(/[^\d+]/g, "") === digits) || sender.includes(c.name.toLowerCase()),
    );
  }
}
