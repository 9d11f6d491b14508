/**
 * Rule-based call summarization
 *
 * Action items and sentiment come from the caller's final turns only, so
 * the assistant's own lines never produce items.
 */

import type {
  CallEndReason,
  CallerInfo,
  CallSentiment,
  CallSummary,
  Utterance,
} from "./types.js";

/** Caller turns considered for action items */
const FINAL_TURNS = 6;

const ACTION_RULES: Array<[pattern: RegExp, item: string]> = [
  [/\bcall (?:him|her|them|me|back)\b|\b(?:will|should|please) call\b/, "Call back"],
  [/\b(?:message|text) (?:him|her|them|me)\b/, "Send message"],
  [/\b(?:urgent|important|asap)\b/, "Follow up (marked urgent)"],
  [/\be-?mail\b/, "Check for email"],
  [/\b(?:tomorrow|later|soon|next week)\b/, "Schedule follow-up"],
];

const URGENT_WORDS = ["urgent", "emergency", "immediately", "asap", "critical", "important"];
const NEGATIVE_WORDS = ["angry", "frustrated", "bad", "terrible", "awful", "wrong", "problem", "issue"];
const POSITIVE_WORDS = ["good", "great", "excellent", "thank", "appreciate", "helpful"];

const END_REASON_TEXT: Record<CallEndReason, string> = {
  hangup: "Caller hung up.",
  goodbye: "Caller said goodbye.",
  silence: "Caller went silent.",
  "max-duration": "Call reached the maximum duration.",
  timeout: "Conversation stopped: a voice or model call timed out.",
  unavailable: "Conversation stopped: a voice or model service was unavailable.",
  error: "Conversation stopped after an internal error.",
};

export function extractActionItems(transcript: readonly Utterance[]): string[] {
  const text = callerText(transcript, FINAL_TURNS);
  const items: string[] = [];
  for (const [pattern, item] of ACTION_RULES) {
    if (pattern.test(text) && !items.includes(item)) items.push(item);
  }
  return items;
}

export function detectSentiment(transcript: readonly Utterance[]): CallSentiment {
  const text = callerText(transcript);
  if (URGENT_WORDS.some((w) => text.includes(w))) return "urgent";
  const negative = NEGATIVE_WORDS.filter((w) => text.includes(w)).length;
  const positive = POSITIVE_WORDS.filter((w) => text.includes(w)).length;
  if (negative > positive) return "negative";
  if (positive > negative) return "positive";
  return "neutral";
}

function callerText(transcript: readonly Utterance[], lastN?: number): string {
  const turns = transcript.filter((u) => u.speaker === "caller");
  const selected = lastN === undefined ? turns : turns.slice(-lastN);
  return selected.map((u) => u.text.toLowerCase()).join("\n");
}

export interface SummarizeInput {
  callId: string;
  caller: CallerInfo;
  startedAt: number;
  endedAt: number;
  transcript: readonly Utterance[];
  endReason: CallEndReason;
  incomplete: boolean;
  blockedRequests: readonly string[];
}

export function summarizeCall(input: SummarizeInput): CallSummary {
  const callerTurns = input.transcript.filter((u) => u.speaker === "caller");
  const text = callerText(input.transcript);

  const parts: string[] = [];
  if (callerTurns.length === 0) parts.push("Caller did not speak.");
  else if (callerTurns.length === 1) parts.push("Brief exchange with caller.");
  else parts.push(`Conversation with ${callerTurns.length} exchanges.`);

  if (text.includes("message")) parts.push("Caller left a message.");
  if (/\bcall ?back\b|\bcall later\b/.test(text)) parts.push("Asked for a callback.");
  if (input.blockedRequests.length > 0) {
    parts.push("Confidential information was requested but not shared.");
  }
  parts.push(END_REASON_TEXT[input.endReason]);

  return Object.freeze({
    callId: input.callId,
    caller: Object.freeze({ ...input.caller }),
    startedAt: input.startedAt,
    durationMs: Math.max(input.endedAt - input.startedAt, 0),
    transcript: Object.freeze(input.transcript.map((u) => Object.freeze({ ...u }))),
    actionItems: Object.freeze(extractActionItems(input.transcript)),
    summary: parts.join(" "),
    sentiment: detectSentiment(input.transcript),
    endReason: input.endReason,
    incomplete: input.incomplete,
    blockedRequests: Object.freeze([...input.blockedRequests]),
  });
}

/** Owner-facing notification text */
export function formatSummaryMessage(summary: CallSummary): string {
  const who = summary.caller.name ? `${summary.caller.name} (${summary.caller.number})` : summary.caller.number;
  const lines = [
    `📞 **Call from ${who}**`,
    `Duration: ${Math.round(summary.durationMs / 1000)}s`,
    summary.summary,
  ];
  if (summary.incomplete) lines.push("⚠️ Conversation incomplete");
  if (summary.actionItems.length > 0) {
    lines.push("", "**Action items:**", ...summary.actionItems.map((item) => `- ${item}`));
  }
  const said = summary.transcript.filter((u) => u.speaker === "caller").slice(-3);
  if (said.length > 0) {
    lines.push("", "**Caller said:**", ...said.map((u) => `- ${u.text}`));
  }
  return lines.join("\n");
}
