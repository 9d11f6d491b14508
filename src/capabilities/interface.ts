/**
 * External capability interfaces
 *
 * Model inference, speech and telephony live outside this process. The core
 * only sees these narrow contracts. Implementations should throw
 * CapabilityUnavailableError when the backend is down and honour the
 * AbortSignal when one is given.
 */

export interface GenerateConstraints {
  /** Instructions that frame the generation */
  system: string;
  maxTokens: number;
  temperature?: number;
}

export interface BrainCapability {
  generate(prompt: string, constraints: GenerateConstraints, signal?: AbortSignal): Promise<string>;
}

export interface VoiceCapability {
  speak(text: string, signal?: AbortSignal): Promise<void>;
  /**
   * Listen for one caller utterance. Resolves null (or "") when the caller
   * stays silent for timeoutMs.
   */
  transcribe(timeoutMs: number, signal?: AbortSignal): Promise<string | null>;
}

export type TelephonyEvent =
  | { type: "ring"; number: string; name?: string }
  | { type: "answer" }
  | { type: "hangup" };

export type TelephonyListener = (event: TelephonyEvent) => void;

export interface TelephonyPort {
  /** Subscribe to ring/answer/hangup events. Returns an unsubscribe function. */
  onEvent(listener: TelephonyListener): () => void;
  pickup(): Promise<void>;
  reject(): Promise<void>;
  /** End a call the assistant picked up */
  hangup(): Promise<void>;
  /** Place an outbound call */
  dial(number: string): Promise<void>;
}
