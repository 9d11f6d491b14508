/**
 * Prompt construction for the brain, and the content rules around it
 *
 * The brain never receives the owner's name, PIN-like digit runs or
 * financial identifiers: every turn is redacted here, before generation.
 */

import { redactFinancialData } from "../policy/banking.js";
import type { GenerateConstraints } from "../capabilities/interface.js";
import type { Utterance } from "./types.js";

const CONFIDENTIAL_PATTERNS: RegExp[] = [
  /\bwhere (?:are you|is (?:he|she|they))\b/,
  /\bwhere (?:do|does) (?:you|he|she|they) live\b/,
  /\b(?:your|his|her|their) (?:location|address|schedule|plans)\b/,
  /\bwhen (?:are you|will you be|will (?:he|she|they) be)\b/,
  /\b(?:are you|is (?:he|she|they)) (?:home|at home)\b/,
  /\b(?:location|address|whereabouts|schedule|calendar)\b/,
  /\b(?:password|passcode|pin|otp|secret)\b/,
  /\b(?:bank|account|credit card|debit card|card number|cvv|upi)\b/,
  /\b(?:aadhaar|aadhar|pan number|social security)\b/,
  /\b(?:personal information|private)\b/,
];

const GOODBYE_PATTERN =
  /\b(?:good\s?bye|bye|that'?s all|that is all|talk (?:to you )?later|nothing else)\b/;

const URGENT_PATTERN = /\b(?:urgent|emergency|immediately|asap|critical)\b/;

const REFUSALS = [
  "I apologize, but I'm not authorized to share that information.",
  "I'm sorry, I cannot discuss personal or confidential matters over the phone.",
  "For privacy reasons, I'm unable to provide that information.",
];

/** What the owner's name is replaced with; also the default owner name */
export const OWNER_PLACEHOLDER = "the owner";

export const UNSAFE_REPLY_FALLBACK = "I'm not sure about that. Could you please leave a message?";

const SYSTEM_PROMPT = [
  "You are answering a phone call on behalf of the owner, who is unavailable.",
  "Rules:",
  "- Be concise (max 2 sentences)",
  "- Be polite and professional",
  "- Never share personal, location or schedule information",
  "- Never share passwords, financial details or private details",
  "- If unsure, ask the caller to leave a message or call back later",
  "- Respond in the same language as the caller",
].join("\n");

/** Turns of history included in each prompt */
const PROMPT_TURNS = 8;

export function isConfidentialRequest(text: string): boolean {
  const lower = text.toLowerCase();
  return CONFIDENTIAL_PATTERNS.some((p) => p.test(lower));
}

export function isGoodbye(text: string): boolean {
  return GOODBYE_PATTERN.test(text.toLowerCase());
}

export function isUrgent(text: string): boolean {
  return URGENT_PATTERN.test(text.toLowerCase());
}

export function refusal(random: () => number = Math.random): string {
  const index = Math.min(Math.floor(random() * REFUSALS.length), REFUSALS.length - 1);
  return REFUSALS[index] ?? REFUSALS[0] ?? "";
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Remove the owner's name (full and first name), financial identifiers and
 * any remaining run of 4+ digits.
 */
export function redactForBrain(text: string, ownerName: string): string {
  let out = redactFinancialData(text);

  const names = new Set<string>();
  const full = ownerName.trim();
  if (full && full.toLowerCase() !== OWNER_PLACEHOLDER) {
    names.add(full);
    const first = full.split(/\s+/)[0];
    if (first && first.length >= 2) names.add(first);
  }
  // Longest first so the full name wins over the first name
  for (const name of [...names].sort((a, b) => b.length - a.length)) {
    out = out.replace(new RegExp(`\\b${escapeRegExp(name)}\\b`, "gi"), OWNER_PLACEHOLDER);
  }

  return out.replace(/\d(?:[\s-]?\d){3,}/g, "[DIGITS_REDACTED]");
}

export interface BrainPrompt {
  prompt: string;
  constraints: GenerateConstraints;
}

export function buildPrompt(transcript: readonly Utterance[], ownerName: string): BrainPrompt {
  const lines = transcript
    .slice(-PROMPT_TURNS)
    .map((u) => `${u.speaker === "caller" ? "Caller" : "Assistant"}: ${redactForBrain(u.text, ownerName)}`);
  lines.push("Assistant:");

  return {
    prompt: lines.join("\n"),
    constraints: { system: SYSTEM_PROMPT, maxTokens: 100, temperature: 0.7 },
  };
}

/** A reply is spoken only if it leaks nothing the prompt redaction would have removed */
export function isSafeReply(reply: string, ownerName: string): boolean {
  if (!reply.trim()) return false;
  if (isConfidentialRequest(reply)) return false;
  return redactForBrain(reply, ownerName) === reply;
}
