/**
 * CallMonitor - owns CallState and the auto-pickup timer
 *
 *   idle ──ring──▶ ringing ──answer──▶ user-answered
 *                     │
 *                     └─timer─▶ auto-pickup-pending ──granted──▶ in-conversation
 *                                        │                            │
 *                                        └─denied──▶ rejected          ▼
 *                                                          summarizing ──▶ completed
 *
 * Every change goes through transition(expected, next), a synchronous
 * compare-and-swap. When answer and timer race out of ringing, exactly one
 * transition succeeds and the other is a no-op.
 */

import { ulid } from "ulid";
import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import type { TelephonyEvent, TelephonyPort } from "../capabilities/interface.js";
import type { AuthorizationEngine } from "../gate/engine.js";
import type { Notifier } from "../dispatch/dispatcher.js";
import { formatSummaryMessage, summarizeCall } from "./summary.js";
import type { CallNotesStore } from "./notes.js";
import {
  CALL_TRANSITIONS,
  type CallAbortReason,
  type CallerInfo,
  type CallState,
  type CallStatus,
  type CallSummary,
  type ConversationResult,
  type ConversationRunner,
  type Utterance,
} from "./types.js";

const log = createLogger("call-monitor");

export type CallStateListener = (state: CallState, previous: CallState) => void;

export interface CallMonitorOptions {
  engine: AuthorizationEngine;
  telephony: TelephonyPort;
  conversation: ConversationRunner;
  /** Principal the call_pickup authorization runs as */
  owner: string;
  autoPickupEnabled: boolean;
  autoPickupDelayMs: number;
  maxDurationMs: number;
  notes?: CallNotesStore;
  notifier?: Notifier;
  now?: () => number;
}

export class CallMonitor {
  private current: CallState = { status: "idle" };
  private readonly listeners = new Set<CallStateListener>();
  private readonly options: CallMonitorOptions;
  private readonly now: () => number;

  private pickupTimer: NodeJS.Timeout | null = null;
  private conversationAbort: AbortController | null = null;
  private inflight: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;
  private stopping = false;

  constructor(options: CallMonitorOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  get state(): CallState {
    return this.current;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.stopping = false;
    this.unsubscribe = this.options.telephony.onEvent((event) => this.handleEvent(event));
    log.info(
      this.options.autoPickupEnabled
        ? `Call monitor started (auto-pickup after ${this.options.autoPickupDelayMs / 1000}s)`
        : "Call monitor started (auto-pickup disabled)",
    );
  }

  async stop(): Promise<void> {
    this.stopping = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.clearPickupTimer();
    this.conversationAbort?.abort("shutdown" satisfies CallAbortReason);
    await this.settled();
    log.info("Call monitor stopped");
  }

  onStateChange(listener: CallStateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Resolves once the in-flight pickup/conversation/summary work is done */
  async settled(): Promise<void> {
    while (this.inflight) await this.inflight;
  }

  handleEvent(event: TelephonyEvent): void {
    switch (event.type) {
      case "ring":
        this.handleRing({ number: event.number, ...(event.name ? { name: event.name } : {}) });
        return;
      case "answer":
        this.handleAnswer();
        return;
      case "hangup":
        this.handleHangup();
        return;
    }
  }

  handleRing(caller: CallerInfo): boolean {
    const next: CallState = { status: "ringing", callId: ulid(this.now()), caller, startedAt: this.now() };
    const from = this.current.status;
    if (from !== "idle" && from !== "completed" && from !== "rejected") {
      log.debug(`Ring from ${caller.number} ignored while ${from}`);
      return false;
    }
    if (!this.transition(from, next)) return false;

    log.info(`Incoming call from ${caller.number}`);
    if (this.options.autoPickupEnabled) {
      const { callId } = next;
      this.pickupTimer = setTimeout(() => this.onPickupTimer(callId), this.options.autoPickupDelayMs);
      this.pickupTimer.unref?.();
    }
    return true;
  }

  handleAnswer(): boolean {
    const state = this.current;
    if (state.status !== "ringing") return false;
    const answered = this.transition("ringing", {
      status: "user-answered",
      callId: state.callId,
      caller: state.caller,
      startedAt: state.startedAt,
    });
    if (answered) {
      this.clearPickupTimer();
      log.info(`Call from ${state.caller.number} answered by user`);
    }
    return answered;
  }

  handleHangup(): void {
    const state = this.current;
    switch (state.status) {
      case "ringing":
        this.clearPickupTimer();
        this.transition("ringing", { status: "idle" });
        log.info(`Missed call from ${state.caller.number} ended before pickup`);
        return;
      case "auto-pickup-pending":
      case "user-answered":
        this.transition(state.status, { status: "idle" });
        return;
      case "in-conversation":
        this.conversationAbort?.abort("hangup" satisfies CallAbortReason);
        return;
      case "idle":
      case "summarizing":
      case "completed":
      case "rejected":
        return;
    }
  }

  /**
   * Compare-and-swap on CallState. Returns false, changing nothing, when the
   * current status is not `expected`.
   */
  transition(expected: CallStatus, next: CallState): boolean {
    const previous = this.current;
    if (previous.status !== expected) return false;
    if (!CALL_TRANSITIONS[expected].includes(next.status)) {
      throw new Error(`Illegal call transition ${expected} -> ${next.status}`);
    }

    this.current = next;
    log.debug(`Call state ${expected} -> ${next.status}`);
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        log.error(`Call state listener failed: ${errorMessage(err)}`);
      }
    }
    return true;
  }

  private onPickupTimer(callId: string): void {
    this.pickupTimer = null;
    const state = this.current;
    if (state.status !== "ringing" || state.callId !== callId) return;

    const won = this.transition("ringing", {
      status: "auto-pickup-pending",
      callId,
      caller: state.caller,
      startedAt: state.startedAt,
      deadline: state.startedAt + this.options.autoPickupDelayMs,
    });
    if (!won) return;

    this.track(this.autoPickup(callId, state.caller, state.startedAt));
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((err) => {
        log.error(`Call handling failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        if (this.inflight === tracked) this.inflight = null;
      });
    this.inflight = tracked;
  }

  private async autoPickup(callId: string, caller: CallerInfo, startedAt: number): Promise<void> {
    const decision = await this.options.engine.authorize(this.options.owner, {
      kind: "call_pickup",
      origin: "system",
      payload: { caller: caller.number },
    });

    const state = this.current;
    if (state.status !== "auto-pickup-pending" || state.callId !== callId) {
      log.info(`Call ${callId} ended before pickup completed`);
      return;
    }

    if (decision.type !== "granted") {
      await this.rejectCall(callId, caller, decision.type);
      return;
    }
    if (this.stopping) {
      await this.rejectCall(callId, caller, "shutdown");
      return;
    }

    try {
      await this.options.telephony.pickup();
    } catch (err) {
      log.error(`Pickup failed: ${errorMessage(err)}`);
      await this.rejectCall(callId, caller, "pickup-failed");
      return;
    }

    const entered = this.transition("auto-pickup-pending", {
      status: "in-conversation",
      callId,
      caller,
      startedAt,
      transcript: [],
    });
    if (!entered) return;

    log.info(`Auto-picked up call from ${caller.number}`);
    const result = await this.converse(callId, caller);
    await this.finish(callId, caller, startedAt, result);
  }

  private async rejectCall(callId: string, caller: CallerInfo, reason: string): Promise<void> {
    if (!this.transition("auto-pickup-pending", { status: "rejected", callId, caller, reason })) return;
    log.warn(`Auto-pickup of ${caller.number} refused: ${reason}`);
    try {
      await this.options.telephony.reject();
    } catch (err) {
      log.error(`Reject failed: ${errorMessage(err)}`);
    }
  }

  private async converse(callId: string, caller: CallerInfo): Promise<ConversationResult> {
    const controller = new AbortController();
    this.conversationAbort = controller;
    // stop() may have run while the line was being picked up
    if (this.stopping) controller.abort("shutdown" satisfies CallAbortReason);
    const maxTimer = setTimeout(
      () => controller.abort("max-duration" satisfies CallAbortReason),
      this.options.maxDurationMs,
    );
    maxTimer.unref?.();

    try {
      return await this.options.conversation.run({
        callId,
        caller,
        signal: controller.signal,
        appendUtterance: (utterance) => this.appendUtterance(callId, utterance),
      });
    } catch (err) {
      log.error(`Conversation runner threw: ${errorMessage(err)}`);
      return { endReason: "error", incomplete: true, blockedRequests: [] };
    } finally {
      clearTimeout(maxTimer);
      this.conversationAbort = null;
    }
  }

  private appendUtterance(callId: string, utterance: Utterance): boolean {
    const state = this.current;
    if (state.status !== "in-conversation" || state.callId !== callId) return false;
    this.current = { ...state, transcript: [...state.transcript, utterance] };
    return true;
  }

  private async finish(
    callId: string,
    caller: CallerInfo,
    startedAt: number,
    result: ConversationResult,
  ): Promise<void> {
    const state = this.current;
    if (state.status !== "in-conversation" || state.callId !== callId) return;

    // The assistant ends the line itself unless the caller already hung up
    if (result.endReason !== "hangup") {
      try {
        await this.options.telephony.hangup();
      } catch (err) {
        log.warn(`Hangup failed: ${errorMessage(err)}`);
      }
    }

    const { transcript } = state;
    if (!this.transition("in-conversation", { status: "summarizing", callId, caller, startedAt, transcript })) {
      return;
    }

    const summary = summarizeCall({
      callId,
      caller,
      startedAt,
      endedAt: this.now(),
      transcript,
      endReason: result.endReason,
      incomplete: result.incomplete,
      blockedRequests: result.blockedRequests,
    });
    this.transition("summarizing", { status: "completed", summary });
    log.info(`Call ${callId} completed (${summary.endReason}, ${summary.actionItems.length} action items)`);

    await this.deliver(summary);
  }

  private async deliver(summary: CallSummary): Promise<void> {
    if (this.options.notes) {
      try {
        await this.options.notes.append(summary);
      } catch (err) {
        log.error(`Failed to save call notes: ${errorMessage(err)}`);
      }
    }
    if (this.options.notifier) {
      await this.options.notifier.notify(this.options.owner, formatSummaryMessage(summary));
    }
  }

  private clearPickupTimer(): void {
    if (this.pickupTimer) {
      clearTimeout(this.pickupTimer);
      this.pickupTimer = null;
    }
  }
}
