/**
 * PermissionPolicy - immutable action kind -> level table
 *
 * Resolution order: exact match -> first matching wildcard -> UnknownActionError.
 * There is no fallback level.
 */

import { minimatch } from "minimatch";
import { createLogger } from "../utils/logger.js";
import { UnknownActionError } from "../utils/errors.js";
import { BankingGuard } from "./banking.js";
import { PermissionLevel, type ActionDefinition } from "./types.js";
import type { PolicyConfig } from "./schema.js";

const log = createLogger("permission-policy");

interface WildcardRule {
  pattern: string;
  level: PermissionLevel;
  description: string;
}

export class PermissionPolicy {
  private readonly actions: ReadonlyMap<string, ActionDefinition>;
  private readonly wildcards: readonly WildcardRule[];
  private readonly banking: BankingGuard;

  constructor(config: PolicyConfig, banking: BankingGuard) {
    const actions = new Map<string, ActionDefinition>();
    for (const [kind, def] of Object.entries(config.actions)) {
      actions.set(kind, Object.freeze({ kind, level: def.level, description: def.description ?? kind }));
    }
    this.actions = actions;
    this.wildcards = Object.freeze(
      (config.wildcards ?? []).map((w) =>
        Object.freeze({ pattern: w.pattern, level: w.level, description: w.description ?? w.pattern }),
      ),
    );
    this.banking = banking;
    Object.freeze(this);

    log.info("Policy ready", {
      actionCount: actions.size,
      wildcardCount: this.wildcards.length,
      blocklistSize: banking.blocklistSize(),
    });
  }

  resolve(kind: string): PermissionLevel {
    const exact = this.actions.get(kind);
    if (exact) return exact.level;

    for (const rule of this.wildcards) {
      if (minimatch(kind, rule.pattern)) {
        log.debug(`Policy matched (wildcard): ${kind} <- ${rule.pattern}`);
        return rule.level;
      }
    }

    throw new UnknownActionError(kind);
  }

  /**
   * True for L5 kinds and for kinds on the banking blocklist. Unknown kinds
   * are not blocked here; resolve() rejects them.
   */
  isBlocked(kind: string): boolean {
    if (this.banking.isBankingApp(kind)) return true;
    try {
      return this.resolve(kind) === PermissionLevel.L5;
    } catch (err) {
      if (err instanceof UnknownActionError) return false;
      throw err;
    }
  }

  /** Whether an action's target app (payload.app / payload.package) is a banking app */
  isBlockedTarget(identifier: string): boolean {
    return this.banking.isBankingApp(identifier);
  }

  describe(): ActionDefinition[] {
    return [...this.actions.values()].sort((a, b) => a.level - b.level || a.kind.localeCompare(b.kind));
  }

  get guard(): BankingGuard {
    return this.banking;
  }
}
