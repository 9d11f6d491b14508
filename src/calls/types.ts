/**
 * Call handling types
 */

export interface CallerInfo {
  number: string;
  /** Display name from telephony or the contact list */
  name?: string;
}

export interface Utterance {
  speaker: "assistant" | "caller";
  text: string;
  at: number;
}

export type CallEndReason =
  | "hangup"
  | "goodbye"
  | "silence"
  | "max-duration"
  | "timeout"
  | "unavailable"
  | "error";

export type CallSentiment = "urgent" | "negative" | "positive" | "neutral";

export interface CallSummary {
  readonly callId: string;
  readonly caller: CallerInfo;
  readonly startedAt: number;
  readonly durationMs: number;
  readonly transcript: readonly Utterance[];
  readonly actionItems: readonly string[];
  readonly summary: string;
  readonly sentiment: CallSentiment;
  readonly endReason: CallEndReason;
  /** The conversation ended early because a capability failed or stalled */
  readonly incomplete: boolean;
  /** Caller requests refused as confidential */
  readonly blockedRequests: readonly string[];
}

export type CallState =
  | { status: "idle" }
  | { status: "ringing"; callId: string; caller: CallerInfo; startedAt: number }
  | { status: "user-answered"; callId: string; caller: CallerInfo; startedAt: number }
  | {
      status: "auto-pickup-pending";
      callId: string;
      caller: CallerInfo;
      startedAt: number;
      deadline: number;
    }
  | {
      status: "in-conversation";
      callId: string;
      caller: CallerInfo;
      startedAt: number;
      transcript: readonly Utterance[];
    }
  | {
      status: "summarizing";
      callId: string;
      caller: CallerInfo;
      startedAt: number;
      transcript: readonly Utterance[];
    }
  | { status: "completed"; summary: CallSummary }
  | { status: "rejected"; callId: string; caller: CallerInfo; reason: string };

export type CallStatus = CallState["status"];

/** Legal next statuses for each status */
export const CALL_TRANSITIONS: Readonly<Record<CallStatus, readonly CallStatus[]>> = {
  idle: ["ringing"],
  ringing: ["user-answered", "auto-pickup-pending", "idle"],
  "user-answered": ["idle"],
  "auto-pickup-pending": ["in-conversation", "rejected", "idle"],
  "in-conversation": ["summarizing"],
  summarizing: ["completed"],
  completed: ["ringing", "idle"],
  rejected: ["ringing", "idle"],
};

/** Why the monitor aborted a running conversation */
export type CallAbortReason = "hangup" | "max-duration" | "shutdown";

export interface ConversationResult {
  endReason: CallEndReason;
  incomplete: boolean;
  blockedRequests: string[];
}

export interface ConversationParams {
  callId: string;
  caller: CallerInfo;
  /** Aborted on hangup or when the maximum call duration is reached */
  signal: AbortSignal;
  /** Returns false once the call has left in-conversation */
  appendUtterance(utterance: Utterance): boolean;
}

export interface ConversationRunner {
  run(params: ConversationParams): Promise<ConversationResult>;
}

export interface Contact {
  number: string;
  name: string;
  relation?: string;
}
