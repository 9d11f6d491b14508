import { describe, it, expect, vi, afterEach } from "vitest";
import { ConversationHandler } from "../conversation.js";
import { UNSAFE_REPLY_FALLBACK } from "../prompt.js";
import { CapabilityUnavailableError } from "../../utils/errors.js";
import type { BrainCapability, VoiceCapability } from "../../capabilities/interface.js";
import type { ConversationParams, Utterance } from "../types.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const MORNING = new Date(2026, 0, 1, 9, 0).getTime();
const OWNER_NAME = "Asha Rao";

function scriptedVoice(heard: Array<string | null>) {
  const spoken: string[] = [];
  const voice: VoiceCapability = {
    speak: vi.fn(async (text: string) => {
      spoken.push(text);
    }),
    transcribe: vi.fn(async () => heard.shift() ?? null),
  };
  return { voice, spoken };
}

function fixedBrain(reply: string) {
  const prompts: string[] = [];
  const brain: BrainCapability = {
    generate: vi.fn(async (prompt: string) => {
      prompts.push(prompt);
      return reply;
    }),
  };
  return { brain, prompts };
}

function handler(voice: VoiceCapability, brain: BrainCapability) {
  return new ConversationHandler({
    voice,
    brain,
    ownerName: OWNER_NAME,
    contacts: [{ number: "+15550100", name: "Ravi" }],
    turnTimeoutMs: 1_000,
    maxSilentTurns: 2,
    now: () => MORNING,
    random: () => 0,
  });
}

function params(number: string, signal = new AbortController().signal) {
  const appended: Utterance[] = [];
  const p: ConversationParams = {
    callId: "call-1",
    caller: { number },
    signal,
    appendUtterance: (u) => {
      appended.push(u);
      return true;
    },
  };
  return { params: p, appended };
}

describe("ConversationHandler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("greets a contact, answers through the brain and closes on goodbye", async () => {
    const { voice, spoken } = scriptedVoice(["Hi, is Asha there? Tell her 4321 is the gate code", "Okay bye"]);
    const { brain } = fixedBrain("Sure, I'll pass that along.");
    const { params: p, appended } = params("+1 555 0100");

    const result = await handler(voice, brain).run(p);

    expect(result).toEqual({ endReason: "goodbye", incomplete: false, blockedRequests: [] });
    expect(spoken).toEqual([
      "Good morning Ravi! Asha Rao is currently unavailable. How may I help you?",
      "Sure, I'll pass that along.",
      "Thank you for calling. I'll pass your message to Asha Rao. Goodbye!",
    ]);
    expect(appended.map((u) => u.speaker)).toEqual(["assistant", "caller", "assistant", "caller", "assistant"]);
  });

  it("never sends the owner's name or digit runs to the brain", async () => {
    const { voice } = scriptedVoice(["Hi, is Asha there? Tell her 4321 is the gate code", "bye"]);
    const { brain, prompts } = fixedBrain("Sure, I'll pass that along.");

    await handler(voice, brain).run(params("+15550100").params);

    expect(prompts).toEqual([
      [
        "Assistant: Good morning Ravi! the owner is currently unavailable. How may I help you?",
        "Caller: Hi, is the owner there? Tell her [DIGITS_REDACTED] is the gate code",
        "Assistant:",
      ].join("\n"),
    ]);
  });

  it("refuses confidential requests without asking the brain", async () => {
    const { voice, spoken } = scriptedVoice(["Where is she? Asha said 9876", "bye"]);
    const { brain } = fixedBrain("unused");

    const result = await handler(voice, brain).run(params("+15550199").params);

    expect(result.blockedRequests).toEqual(["Where is she? the owner said [DIGITS_REDACTED]"]);
    expect(spoken[1]).toBe("I apologize, but I'm not authorized to share that information.");
    expect(brain.generate).not.toHaveBeenCalled();
  });

  it("closes urgently when the caller said it was urgent", async () => {
    const { voice, spoken } = scriptedVoice(["This is urgent, bye"]);
    const { brain } = fixedBrain("unused");

    await handler(voice, brain).run(params("+15550199").params);

    expect(spoken.at(-1)).toBe("I'll make sure Asha Rao gets this message urgently. Goodbye!");
  });

  it("follows up on silence, then hangs up", async () => {
    const { voice, spoken } = scriptedVoice([null, "   "]);
    const { brain } = fixedBrain("unused");

    const result = await handler(voice, brain).run(params("+15550199").params);

    expect(result).toEqual({ endReason: "silence", incomplete: false, blockedRequests: [] });
    expect(spoken).toEqual([
      "Hello! You've reached Asha Rao. They're unavailable right now. Please leave your name and message.",
      "I'm still here. How can I help you?",
      "I didn't hear anything. Please call back later. Goodbye!",
    ]);
  });

  it("replaces an unsafe reply with a fallback", async () => {
    const { voice, spoken } = scriptedVoice(["Can I speak to someone?", "bye"]);
    const { brain } = fixedBrain("Asha Rao is at the office.");

    await handler(voice, brain).run(params("+15550199").params);

    expect(spoken[1]).toBe(UNSAFE_REPLY_FALLBACK);
  });

  it("ends as incomplete when transcription stalls", async () => {
    vi.useFakeTimers();
    let markListening: () => void = () => {};
    const listening = new Promise<void>((resolve) => {
      markListening = resolve;
    });
    const { voice } = scriptedVoice([]);
    voice.transcribe = vi.fn(() => {
      markListening();
      return new Promise<string | null>(() => {});
    });
    const { brain } = fixedBrain("unused");

    const running = handler(voice, brain).run(params("+15550199").params);
    await listening;
    // turn timeout plus the listening grace period
    await vi.advanceTimersByTimeAsync(6_000);

    expect(await running).toEqual({ endReason: "timeout", incomplete: true, blockedRequests: [] });
  });

  it("ends as incomplete when the brain is unavailable", async () => {
    const { voice } = scriptedVoice(["Can I leave a message?"]);
    const brain: BrainCapability = {
      generate: vi.fn(async () => {
        throw new CapabilityUnavailableError("brain");
      }),
    };

    const result = await handler(voice, brain).run(params("+15550199").params);

    expect(result).toEqual({ endReason: "unavailable", incomplete: true, blockedRequests: [] });
  });

  it("stops when the call is aborted for max duration", async () => {
    const controller = new AbortController();
    const { voice } = scriptedVoice([]);
    voice.transcribe = vi.fn(() => {
      controller.abort("max-duration");
      return new Promise<string | null>(() => {});
    });
    const { brain } = fixedBrain("unused");

    const result = await handler(voice, brain).run(params("+15550199", controller.signal).params);

    expect(result).toEqual({ endReason: "max-duration", incomplete: false, blockedRequests: [] });
  });

  it("reports a hangup when aborted for any other reason", async () => {
    const controller = new AbortController();
    controller.abort("hangup");
    const { voice } = scriptedVoice([]);
    const { brain } = fixedBrain("unused");

    const result = await handler(voice, brain).run(params("+15550199", controller.signal).params);

    expect(result).toEqual({ endReason: "hangup", incomplete: false, blockedRequests: [] });
    expect(voice.speak).not.toHaveBeenCalled();
  });
});
