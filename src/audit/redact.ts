/**
 * Payload redaction for audit records.
 *
 * Credential-looking keys are masked outright; every string is passed
 * through the financial redactor and clipped.
 */

import { createLogger } from "../utils/logger.js";
import { redactFinancialData } from "../policy/banking.js";

const log = createLogger("audit-redact");

const SENSITIVE_KEY = /pin|pass(word|code)?|otp|secret|token|api_?key|auth|cvv/i;
const MAX_STRING = 200;
const CLIPPED = 50;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactValue(value: unknown): unknown {
  if (typeof value === "string") {
    const cleaned = redactFinancialData(value);
    return cleaned.length > MAX_STRING ? `${cleaned.slice(0, CLIPPED)}...[truncated]` : cleaned;
  }
  if (Array.isArray(value)) return value.map(redactValue);
  if (isRecord(value)) return redactPayload(value);
  return value;
}

export function redactPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (SENSITIVE_KEY.test(key)) {
      out[key] = "[REDACTED]";
      log.debug(`Redacted sensitive key: ${key}`);
    } else {
      out[key] = redactValue(value);
    }
  }
  return out;
}
