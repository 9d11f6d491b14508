/**
 * AuthorizationEngine - the single gate every privileged action passes
 *
 * Order of checks:
 *   blocked -> resolve level (L1 auto) -> standing grant -> session level
 *   -> confirmation (L3+) -> confirmation delay (L4) -> granted
 *
 * Each call enqueues exactly one audit record before it returns. If the
 * audit log refuses the record the decision is system-error, never granted.
 * authorize() does not throw.
 */

import { createLogger } from "../utils/logger.js";
import { UnknownActionError, errorMessage } from "../utils/errors.js";
import type { AuditLog, AuditOutcome } from "../audit/logger.js";
import type { SessionStore, VerifyResult } from "../auth/session-store.js";
import type { PermissionPolicy } from "../policy/policy.js";
import {
  PermissionLevel,
  levelName,
  type Action,
  type ActionRequest,
} from "../policy/types.js";
import type { ConfirmationLedger, PendingConfirmation } from "./confirmations.js";

const log = createLogger("auth-engine");

export type Decision =
  | { type: "granted"; action: Action; reason: string }
  | { type: "denied-needs-auth"; level: PermissionLevel }
  | { type: "denied-blocked"; reason: string }
  | { type: "denied-pending-confirmation"; token: string; level: PermissionLevel }
  | { type: "denied-pending-delay"; remainingMs: number }
  | { type: "system-error"; reason: string };

/** Delivers a confirmation prompt to the principal and returns its token */
export interface ConfirmationRequester {
  requestConfirmation(principalId: string, action: Action): Promise<string>;
}

export interface AuthorizationEngineDeps {
  policy: PermissionPolicy;
  sessions: SessionStore;
  audit: AuditLog;
  ledger: ConfirmationLedger;
  confirmations: ConfirmationRequester;
  /** Mandatory wait between confirmation and execution of L4 actions */
  l4DelayMs: number;
  /** Kinds granted without a session when requested by a system loop */
  standingGrants?: Iterable<string>;
  now?: () => number;
}

const TARGET_KEYS = ["app", "package"] as const;

export class AuthorizationEngine {
  private readonly policy: PermissionPolicy;
  private readonly sessions: SessionStore;
  private readonly audit: AuditLog;
  private readonly ledger: ConfirmationLedger;
  private readonly confirmations: ConfirmationRequester;
  private readonly l4DelayMs: number;
  private readonly standingGrants: ReadonlySet<string>;
  private readonly now: () => number;

  constructor(deps: AuthorizationEngineDeps) {
    this.policy = deps.policy;
    this.sessions = deps.sessions;
    this.audit = deps.audit;
    this.ledger = deps.ledger;
    this.confirmations = deps.confirmations;
    this.l4DelayMs = deps.l4DelayMs;
    this.standingGrants = new Set(deps.standingGrants ?? []);
    this.now = deps.now ?? Date.now;
  }

  async authorize(principalId: string, request: ActionRequest): Promise<Decision> {
    try {
      return await this.evaluate(principalId, request);
    } catch (err) {
      log.error(`Authorization failed for ${principalId} ${request.kind}: ${errorMessage(err)}`);
      return this.record(principalId, request, undefined, "error", "internal-error", {
        type: "system-error",
        reason: "internal-error",
      });
    }
  }

  async verifyPin(principalId: string, pin: string): Promise<VerifyResult> {
    const result = await this.sessions.verify(principalId, pin);
    const appended = this.audit.append({
      event: "auth",
      principalId,
      actionKind: "pin_verify",
      outcome: result.ok ? "granted" : "denied",
      reason: result.ok ? "verified" : result.error,
    });
    if (!appended.ok) log.error(`Auth event for ${principalId} not audited: ${appended.error}`);
    return result;
  }

  async logout(principalId: string): Promise<void> {
    await this.sessions.logout(principalId);
    const appended = this.audit.append({
      event: "auth",
      principalId,
      actionKind: "logout",
      outcome: "granted",
      reason: "logout",
    });
    if (!appended.ok) log.error(`Auth event for ${principalId} not audited: ${appended.error}`);
  }

  private async evaluate(principalId: string, request: ActionRequest): Promise<Decision> {
    const { kind } = request;

    // 1. Blocked kinds and banking targets, before anything else
    const blockedReason = this.blockedReason(request);
    if (blockedReason) {
      log.warn(`Blocked ${kind} for ${principalId}: ${blockedReason}`);
      return this.record(principalId, request, PermissionLevel.L5, "blocked", blockedReason, {
        type: "denied-blocked",
        reason: blockedReason,
      });
    }

    // 2. Level from policy only
    let level: PermissionLevel;
    try {
      level = this.policy.resolve(kind);
    } catch (err) {
      if (!(err instanceof UnknownActionError)) throw err;
      log.error(`Unknown action kind requested: ${kind}`);
      return this.record(principalId, request, undefined, "error", "unknown-action", {
        type: "system-error",
        reason: "unknown-action",
      });
    }

    const action: Action = {
      kind,
      requiredLevel: level,
      payload: request.payload ?? {},
      requestedAt: request.requestedAt ?? this.now(),
      origin: request.origin ?? "user",
      ...(request.confirmationToken ? { confirmationToken: request.confirmationToken } : {}),
    };

    if (level === PermissionLevel.L1) {
      return this.record(principalId, request, level, "granted", "no-auth-required", {
        type: "granted",
        action,
        reason: "no-auth-required",
      });
    }

    // 3. Standing grants for background loops
    if (action.origin === "system" && this.standingGrants.has(kind)) {
      return this.record(principalId, request, level, "granted", "standing-grant", {
        type: "granted",
        action,
        reason: "standing-grant",
      });
    }

    // 4. Session (expiry is evaluated lazily by the store)
    if (this.sessions.effectiveLevel(principalId) < level) {
      return this.record(principalId, request, level, "denied", "needs-auth", {
        type: "denied-needs-auth",
        level,
      });
    }

    let confirmation: PendingConfirmation | undefined;
    if (level >= PermissionLevel.L3) {
      // 5. Explicit confirmation of this exact action
      confirmation = request.confirmationToken
        ? this.ledger.findConfirmed(request.confirmationToken, principalId, kind, action.payload)
        : undefined;

      if (!confirmation) {
        const token = await this.confirmations.requestConfirmation(principalId, action);
        return this.record(principalId, request, level, "denied", "pending-confirmation", {
          type: "denied-pending-confirmation",
          token,
          level,
        });
      }

      // 6. L4 cooling-off, measured from the moment of confirmation
      if (level === PermissionLevel.L4) {
        const elapsed = this.now() - (confirmation.confirmedAt ?? confirmation.createdAt);
        if (elapsed < this.l4DelayMs) {
          return this.record(principalId, request, level, "denied", "pending-delay", {
            type: "denied-pending-delay",
            remainingMs: this.l4DelayMs - elapsed,
          });
        }
      }
    }

    // 7. Granted: audit first, then consume the token and slide the session
    const decision = this.record(principalId, request, level, "granted", "authorized", {
      type: "granted",
      action,
      reason: "authorized",
    });
    if (decision.type !== "granted") return decision;

    if (confirmation) this.ledger.consume(confirmation.token);
    await this.sessions.touch(principalId);
    log.info(`Granted ${kind} (${levelName(level)}) to ${principalId}`);
    return decision;
  }

  private blockedReason(request: ActionRequest): string | undefined {
    if (this.policy.isBlocked(request.kind)) return "blocked-action";
    for (const key of TARGET_KEYS) {
      const target = request.payload?.[key];
      if (typeof target === "string" && this.policy.isBlockedTarget(target)) {
        return "blocked-target";
      }
    }
    return undefined;
  }

  /**
   * Enqueue the audit record for a decision. A refused record turns the
   * decision into system-error.
   */
  private record(
    principalId: string,
    request: ActionRequest,
    requiredLevel: PermissionLevel | undefined,
    outcome: AuditOutcome,
    reason: string,
    decision: Decision,
  ): Decision {
    const appended = this.audit.append({
      event: "decision",
      principalId,
      actionKind: request.kind,
      outcome,
      reason,
      ...(requiredLevel !== undefined ? { requiredLevel } : {}),
      ...(request.payload ? { payload: request.payload } : {}),
    });
    if (!appended.ok) {
      log.error(`Audit refused ${request.kind} decision for ${principalId}: ${appended.error}`);
      return { type: "system-error", reason: "audit-unavailable" };
    }
    return decision;
  }
}
