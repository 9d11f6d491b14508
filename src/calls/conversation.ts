/**
 * ConversationHandler - the turn loop of an auto-picked-up call
 *
 * greet -> (listen -> refuse | reply)* -> close
 *
 * Each external call (speak, transcribe, generate) runs under its own
 * deadline and the call's AbortSignal. A stalled or failed capability ends
 * the conversation as incomplete; it never throws to the monitor.
 */

import { createLogger } from "../utils/logger.js";
import {
  AbortedError,
  CapabilityUnavailableError,
  TimeoutError,
  errorMessage,
} from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import type { BrainCapability, VoiceCapability } from "../capabilities/interface.js";
import {
  SILENCE_CLOSING,
  buildClosing,
  buildFollowUp,
  buildGreeting,
  findContact,
} from "./greeting.js";
import {
  UNSAFE_REPLY_FALLBACK,
  buildPrompt,
  isConfidentialRequest,
  isGoodbye,
  isSafeReply,
  isUrgent,
  redactForBrain,
  refusal,
} from "./prompt.js";
import type {
  Contact,
  ConversationParams,
  ConversationResult,
  ConversationRunner,
  Utterance,
} from "./types.js";

const log = createLogger("conversation");

/** Extra time given to transcribe() beyond its own listening window */
const LISTEN_GRACE_MS = 5_000;

export interface ConversationHandlerOptions {
  voice: VoiceCapability;
  brain: BrainCapability;
  ownerName: string;
  contacts?: Contact[];
  turnTimeoutMs: number;
  maxSilentTurns: number;
  /** Deadline for a single speak() (default 30s) */
  speakTimeoutMs?: number;
  now?: () => number;
  random?: () => number;
}

export class ConversationHandler implements ConversationRunner {
  private readonly voice: VoiceCapability;
  private readonly brain: BrainCapability;
  private readonly ownerName: string;
  private readonly contacts: Contact[];
  private readonly turnTimeoutMs: number;
  private readonly maxSilentTurns: number;
  private readonly speakTimeoutMs: number;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(options: ConversationHandlerOptions) {
    this.voice = options.voice;
    this.brain = options.brain;
    this.ownerName = options.ownerName;
    this.contacts = options.contacts ?? [];
    this.turnTimeoutMs = options.turnTimeoutMs;
    this.maxSilentTurns = options.maxSilentTurns;
    this.speakTimeoutMs = options.speakTimeoutMs ?? 30_000;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  async run(params: ConversationParams): Promise<ConversationResult> {
    const { caller, signal } = params;
    const transcript: Utterance[] = [];
    const blockedRequests: string[] = [];
    let urgent = false;

    const record = (speaker: Utterance["speaker"], text: string) => {
      const utterance: Utterance = { speaker, text, at: this.now() };
      transcript.push(utterance);
      params.appendUtterance(utterance);
    };
    const say = async (text: string) => {
      await withTimeout("speak", this.speakTimeoutMs, signal, (s) => this.voice.speak(text, s));
      record("assistant", text);
    };

    try {
      const contact = findContact(this.contacts, caller.number);
      await say(
        buildGreeting({
          ownerName: this.ownerName,
          contactName: contact?.name,
          at: new Date(this.now()),
          random: this.random,
        }),
      );

      let silentTurns = 0;
      for (;;) {
        const heard = await this.listen(signal);
        if (!heard) {
          silentTurns++;
          if (silentTurns >= this.maxSilentTurns) {
            await say(SILENCE_CLOSING);
            return { endReason: "silence", incomplete: false, blockedRequests };
          }
          await say(buildFollowUp(this.random));
          continue;
        }

        silentTurns = 0;
        record("caller", heard);
        if (isUrgent(heard)) urgent = true;

        if (isGoodbye(heard)) {
          await say(buildClosing(this.ownerName, urgent));
          return { endReason: "goodbye", incomplete: false, blockedRequests };
        }

        if (isConfidentialRequest(heard)) {
          log.warn(`Confidential request refused on call ${params.callId}`);
          blockedRequests.push(redactForBrain(heard, this.ownerName));
          await say(refusal(this.random));
          continue;
        }

        await say(await this.reply(transcript, signal));
      }
    } catch (err) {
      return this.endOnError(err, signal, blockedRequests);
    }
  }

  private async listen(signal: AbortSignal): Promise<string | null> {
    const heard = await withTimeout(
      "transcribe",
      this.turnTimeoutMs + LISTEN_GRACE_MS,
      signal,
      (s) => this.voice.transcribe(this.turnTimeoutMs, s),
    );
    const text = heard?.trim();
    return text ? text : null;
  }

  private async reply(transcript: readonly Utterance[], signal: AbortSignal): Promise<string> {
    const { prompt, constraints } = buildPrompt(transcript, this.ownerName);
    const generated = await withTimeout("generate", this.turnTimeoutMs, signal, (s) =>
      this.brain.generate(prompt, constraints, s),
    );
    const reply = generated.trim();
    if (!isSafeReply(reply, this.ownerName)) {
      log.warn("Generated reply withheld by content check");
      return UNSAFE_REPLY_FALLBACK;
    }
    return reply;
  }

  private endOnError(err: unknown, signal: AbortSignal, blockedRequests: string[]): ConversationResult {
    if (err instanceof AbortedError || signal.aborted) {
      const endReason = signal.reason === "max-duration" ? "max-duration" : "hangup";
      return { endReason, incomplete: false, blockedRequests };
    }
    if (err instanceof TimeoutError) {
      log.warn(`Conversation ended: ${err.message}`);
      return { endReason: "timeout", incomplete: true, blockedRequests };
    }
    if (err instanceof CapabilityUnavailableError) {
      log.warn(`Conversation ended: ${err.message}`);
      return { endReason: "unavailable", incomplete: true, blockedRequests };
    }
    log.error(`Conversation failed: ${errorMessage(err)}`);
    return { endReason: "error", incomplete: true, blockedRequests };
  }
}
