/**
 * Confirmation ledger
 *
 * Tracks confirmation tokens for L3+ actions. A token is bound to the
 * principal, the action kind and a digest of the payload, so a reply can
 * only approve the exact action it was issued for.
 */

import { createHash } from "node:crypto";
import { ulid } from "ulid";
import { createLogger } from "../utils/logger.js";

const log = createLogger("confirmations");

export type ConfirmationStatus = "pending" | "confirmed" | "rejected";

export interface PendingConfirmation {
  token: string;
  principalId: string;
  actionKind: string;
  payloadDigest: string;
  createdAt: number;
  expiresAt: number;
  status: ConfirmationStatus;
  confirmedAt?: number;
}

export type ResolveResult =
  | { ok: true; confirmation: PendingConfirmation }
  | { ok: false; error: "not-found" | "expired" | "wrong-principal" | "already-resolved" };

export interface ConfirmationLedgerOptions {
  ttlMs: number;
  now?: () => number;
}

/** Key-order-independent JSON, so equal payloads hash the same */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function payloadDigest(payload: Record<string, unknown>): string {
  return createHash("sha256").update(canonicalJson(payload)).digest("hex");
}

export class ConfirmationLedger {
  private readonly entries = new Map<string, PendingConfirmation>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ConfirmationLedgerOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Issue a token for (principal, kind, payload). An unexpired pending token
   * for the same triple is returned instead of a new one.
   */
  issue(principalId: string, actionKind: string, payload: Record<string, unknown>): PendingConfirmation {
    this.prune();
    const digest = payloadDigest(payload);
    for (const entry of this.entries.values()) {
      if (
        entry.status === "pending" &&
        entry.principalId === principalId &&
        entry.actionKind === actionKind &&
        entry.payloadDigest === digest
      ) {
        return { ...entry };
      }
    }

    const now = this.now();
    const entry: PendingConfirmation = {
      token: ulid(now),
      principalId,
      actionKind,
      payloadDigest: digest,
      createdAt: now,
      expiresAt: now + this.ttlMs,
      status: "pending",
    };
    this.entries.set(entry.token, entry);
    log.debug(`Issued confirmation ${entry.token} for ${principalId} ${actionKind}`);
    return { ...entry };
  }

  get(token: string): PendingConfirmation | undefined {
    const entry = this.entries.get(token);
    return entry ? { ...entry } : undefined;
  }

  /** Record the user's answer to a pending token */
  resolve(principalId: string, token: string, approved: boolean): ResolveResult {
    const entry = this.entries.get(token);
    if (!entry) return { ok: false, error: "not-found" };
    if (entry.principalId !== principalId) {
      log.warn(`Confirmation ${token} answered by ${principalId}, issued to ${entry.principalId}`);
      return { ok: false, error: "wrong-principal" };
    }
    const now = this.now();
    if (now >= entry.expiresAt) {
      this.entries.delete(token);
      return { ok: false, error: "expired" };
    }
    if (entry.status !== "pending") return { ok: false, error: "already-resolved" };

    entry.status = approved ? "confirmed" : "rejected";
    if (approved) {
      // A confirmed token lives a full ttl from confirmation, so an L4 delay
      // shorter than the ttl always ends before the token does.
      entry.confirmedAt = now;
      entry.expiresAt = now + this.ttlMs;
    }
    log.info(`Confirmation ${token} ${entry.status} by ${principalId}`);
    return { ok: true, confirmation: { ...entry } };
  }

  /**
   * A confirmed, unexpired token matching the principal, kind and payload.
   * Anything else (unknown, foreign, rejected, expired, other payload) is undefined.
   */
  findConfirmed(
    token: string,
    principalId: string,
    actionKind: string,
    payload: Record<string, unknown>,
  ): PendingConfirmation | undefined {
    const entry = this.entries.get(token);
    if (!entry || entry.status !== "confirmed") return undefined;
    if (this.now() >= entry.expiresAt) return undefined;
    if (entry.principalId !== principalId || entry.actionKind !== actionKind) return undefined;
    if (entry.payloadDigest !== payloadDigest(payload)) return undefined;
    return { ...entry };
  }

  /** Single use: a granted action removes its token */
  consume(token: string): void {
    this.entries.delete(token);
  }

  /** Drop expired tokens; returns how many were removed */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(token);
        removed++;
      }
    }
    return removed;
  }
}
