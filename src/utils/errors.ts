/**
 * Error types shared across the gate, call and capability layers.
 */

export type ErrorCode =
  | "UNKNOWN_ACTION"
  | "UNAVAILABLE"
  | "TIMEOUT"
  | "ABORTED"
  | "AUDIT_UNAVAILABLE";

export class CallwardError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Action kind not registered in the policy. A programming error, never a default. */
export class UnknownActionError extends CallwardError {
  readonly kind: string;

  constructor(kind: string) {
    super("UNKNOWN_ACTION", `Unknown action: ${kind}`);
    this.kind = kind;
  }
}

/** An external capability (voice, brain, reader, telephony) is down */
export class CapabilityUnavailableError extends CallwardError {
  constructor(capability: string, options?: { cause?: unknown }) {
    super("UNAVAILABLE", `${capability} unavailable`, options);
  }
}

export class TimeoutError extends CallwardError {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number) {
    super("TIMEOUT", `${what} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** The surrounding call was cancelled (hangup, max duration, shutdown) */
export class AbortedError extends CallwardError {
  readonly reason: unknown;

  constructor(what: string, reason?: unknown) {
    super("ABORTED", `${what} aborted`);
    this.reason = reason;
  }
}

export class AuditUnavailableError extends CallwardError {
  constructor(message: string) {
    super("AUDIT_UNAVAILABLE", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
