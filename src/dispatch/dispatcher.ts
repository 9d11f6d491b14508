/**
 * Dispatcher - outbound notifications and confirmation prompts
 *
 * Targets are principal ids ("telegram:123456"). Delivery failures are
 * logged and reported as false; they never throw to background loops.
 */

import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { parsePrincipalId, type OutboundMessage } from "../channels/interface.js";
import type { ChannelRegistry } from "../channels/registry.js";
import { PermissionLevel, levelName, type Action } from "../policy/types.js";
import type { ConfirmationRequester } from "../gate/engine.js";
import type { ConfirmationLedger, PendingConfirmation, ResolveResult } from "../gate/confirmations.js";

const log = createLogger("dispatcher");

/** Outbound notification to a principal. Resolves false when undelivered. */
export interface Notifier {
  notify(principalId: string, message: string): Promise<boolean>;
}

export interface DispatcherOptions {
  channels: ChannelRegistry;
  ledger: ConfirmationLedger;
  /** L4 delay, shown in the confirmation prompt */
  l4DelayMs?: number;
}

export class Dispatcher implements ConfirmationRequester, Notifier {
  private readonly channels: ChannelRegistry;
  private readonly ledger: ConfirmationLedger;
  private readonly l4DelayMs: number;

  constructor(options: DispatcherOptions) {
    this.channels = options.channels;
    this.ledger = options.ledger;
    this.l4DelayMs = options.l4DelayMs ?? 0;
  }

  async notify(principalId: string, message: string | OutboundMessage): Promise<boolean> {
    const target = parsePrincipalId(principalId);
    if (!target) {
      log.error(`Invalid notification target: ${principalId}`);
      return false;
    }

    const channel = this.channels.get(target.channel);
    if (!channel) {
      log.error(`Channel not found: ${target.channel}`);
      return false;
    }

    const outbound = typeof message === "string" ? { text: message } : message;
    try {
      await channel.send(target.userId, outbound);
      log.debug(`Notification sent to ${principalId}`);
      return true;
    } catch (err) {
      log.error(`Failed to send notification to ${principalId}: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Issue (or reuse) a confirmation token for the action and prompt the
   * principal with confirm/deny buttons. The token is returned even when
   * delivery fails, so a retry of the same action reuses it.
   */
  async requestConfirmation(principalId: string, action: Action): Promise<string> {
    const pending = this.ledger.issue(principalId, action.kind, action.payload);
    const lines = [
      `**Confirmation required** (${levelName(action.requiredLevel)})`,
      `Action: ${action.kind}`,
      ...describePayload(action.payload),
    ];
    if (action.requiredLevel === PermissionLevel.L4 && this.l4DelayMs > 0) {
      lines.push(`After confirming, it runs automatically in ${Math.ceil(this.l4DelayMs / 1000)}s.`);
    }
    lines.push(`Reply /confirm ${pending.token} or /deny ${pending.token}`);

    const delivered = await this.notify(principalId, {
      text: lines.join("\n"),
      buttons: [
        { text: "Confirm", callbackData: `/confirm ${pending.token}` },
        { text: "Deny", callbackData: `/deny ${pending.token}` },
      ],
    });
    if (!delivered) log.warn(`Confirmation prompt ${pending.token} not delivered to ${principalId}`);
    return pending.token;
  }

  confirmation(token: string): PendingConfirmation | undefined {
    return this.ledger.get(token);
  }

  /** Correlate a /confirm or /deny reply with its token */
  resolveConfirmation(principalId: string, token: string, approved: boolean): ResolveResult {
    return this.ledger.resolve(principalId, token, approved);
  }
}

function describePayload(payload: Record<string, unknown>): string[] {
  return Object.entries(payload)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => {
      const text = typeof value === "string" ? value : JSON.stringify(value);
      return `${key}: ${text.length > 80 ? text.slice(0, 80) + "…" : text}`;
    });
}
