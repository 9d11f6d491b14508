// src/gateway/commands.ts
/**
 * Chat command router
 *
 * Maps inbound chat text to session commands (/pin, /logout, /confirm,
 * /deny) or to gated actions run through the ActionRunner. Every decision
 * is rendered as a reply. Senders outside the allow list are ignored.
 */

import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { principalIdOf, type MsgContext } from "../channels/interface.js";
import type { ChannelRegistry } from "../channels/registry.js";
import type { Dispatcher } from "../dispatch/dispatcher.js";
import type { ActionOutput, ActionRunner } from "../gate/actions.js";
import type { AuthorizationEngine, Decision } from "../gate/engine.js";
import type { VerifyResult } from "../auth/session-store.js";
import { levelName, type ActionRequest } from "../policy/types.js";
import type { ReaderId } from "../readers/interface.js";

const log = createLogger("commands");

const READ_SOURCES: Record<string, ReaderId> = {
  whatsapp: "whatsapp",
  sms: "sms",
  calendar: "calendar",
  contacts: "contacts",
};

const SIMPLE_ACTIONS: Record<string, string> = {
  "/status": "query_status",
  "/help": "help",
  "/time": "get_time",
  "/tasks": "list_tasks",
  "/calls": "read_call_log",
};

const HELP_TEXT = `**Commands**
• \`/pin <pin>\` — unlock for the session
• \`/logout\` — end the session
• \`/confirm <token>\` / \`/deny <token>\` — answer a confirmation
• \`/status\`, \`/time\`, \`/tasks\`, \`/help\`
• \`/read <whatsapp|sms|calendar|contacts> [query]\`
• \`/calls\` — recent call notes
• \`/audit [n]\` — recent audit records
• \`/file <path>\` — read a file
• \`/edit <path> <text>\` — write a file
• \`/call <number>\` — place a call`;

export interface CommandRouterOptions {
  engine: AuthorizationEngine;
  runner: ActionRunner;
  dispatcher: Dispatcher;
  channels: ChannelRegistry;
  /** The owner principal is always allowed */
  owner: string;
  /** Additional principals ("telegram:123") or bare user ids */
  allowList?: string[];
  now?: () => number;
}

export interface CommandResult {
  /** False when the sender is not allowed and nothing was sent */
  handled: boolean;
  reply?: string;
}

interface PendingRequest {
  principalId: string;
  request: ActionRequest;
}

export class CommandRouter {
  private readonly options: CommandRouterOptions;
  private readonly allowed: Set<string>;
  private readonly now: () => number;
  /** Requests waiting on a confirmation token, re-submitted on /confirm */
  private readonly pending = new Map<string, PendingRequest>();
  private readonly retryTimers = new Set<NodeJS.Timeout>();

  constructor(options: CommandRouterOptions) {
    this.options = options;
    this.allowed = new Set([options.owner, ...(options.allowList ?? [])]);
    this.now = options.now ?? Date.now;
  }

  isAllowed(ctx: MsgContext): boolean {
    return this.allowed.has(principalIdOf(ctx.channel, ctx.from)) || this.allowed.has(ctx.from);
  }

  async handle(ctx: MsgContext): Promise<CommandResult> {
    if (!this.isAllowed(ctx)) {
      log.warn(`Ignoring message from non-allowlisted sender ${ctx.channel}:${ctx.from}`);
      return { handled: false };
    }

    const principalId = principalIdOf(ctx.channel, ctx.from);
    let reply: string;
    try {
      reply = await this.route(principalId, ctx.body.trim());
    } catch (err) {
      log.error(`Command failed for ${principalId}: ${errorMessage(err)}`);
      reply = "⚠️ Something went wrong. Nothing was done.";
    }

    await this.send(ctx, reply);
    return { handled: true, reply };
  }

  /** Forget requests whose confirmation token is gone or past its ttl */
  prunePending(): number {
    const now = this.now();
    let removed = 0;
    for (const token of this.pending.keys()) {
      const confirmation = this.options.dispatcher.confirmation(token);
      if (!confirmation || now >= confirmation.expiresAt) {
        this.pending.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /** Cancel scheduled re-submissions */
  stop(): void {
    for (const timer of this.retryTimers) clearTimeout(timer);
    this.retryTimers.clear();
  }

  async route(principalId: string, body: string): Promise<string> {
    if (!body.startsWith("/")) return "Send /help for the list of commands.";

    const [rawCommand = "", ...rest] = body.split(/\s+/);
    // "/status@my_bot" -> "/status"
    const command = rawCommand.toLowerCase().replace(/@\w+$/, "");
    const args = rest;

    switch (command) {
      case "/start":
        return HELP_TEXT;
      case "/pin":
        return this.pin(principalId, args[0]);
      case "/logout":
        await this.options.engine.logout(principalId);
        return "👋 Logged out.";
      case "/confirm":
        return this.answer(principalId, args[0], true);
      case "/deny":
        return this.answer(principalId, args[0], false);
      case "/read": {
        const source = READ_SOURCES[(args[0] ?? "").toLowerCase()];
        if (!source) return "Usage: /read <whatsapp|sms|calendar|contacts> [query]";
        const query = args.slice(1).join(" ");
        return this.runAction(principalId, { kind: `read_${source}`, payload: query ? { query } : {} });
      }
      case "/file": {
        const path = args[0];
        if (!path) return "Usage: /file <path>";
        return this.runAction(principalId, { kind: "read_file", payload: { path } });
      }
      case "/audit": {
        const limit = args[0] ? Number.parseInt(args[0], 10) : NaN;
        return this.runAction(principalId, {
          kind: "read_audit_log",
          payload: Number.isInteger(limit) && limit > 0 ? { limit } : {},
        });
      }
      case "/edit": {
        const [path, ...words] = args;
        if (!path || words.length === 0) return "Usage: /edit <path> <text>";
        return this.runAction(principalId, { kind: "edit_file", payload: { path, content: words.join(" ") } });
      }
      case "/call": {
        if (!args[0]) return "Usage: /call <number>";
        return this.runAction(principalId, { kind: "make_call", payload: { number: args[0] } });
      }
      case "/pay":
        return this.runAction(principalId, { kind: "banking_transfer", payload: { details: args.join(" ") } });
      default: {
        const kind = SIMPLE_ACTIONS[command];
        if (kind) return this.runAction(principalId, { kind });
        return `Unknown command ${command}. Send /help for the list.`;
      }
    }
  }

  private async pin(principalId: string, pin: string | undefined): Promise<string> {
    if (!pin) return "Usage: /pin <pin>";
    return renderVerify(await this.options.engine.verifyPin(principalId, pin), this.now());
  }

  private async answer(principalId: string, token: string | undefined, approved: boolean): Promise<string> {
    if (!token) return `Usage: /${approved ? "confirm" : "deny"} <token>`;

    const result = this.options.dispatcher.resolveConfirmation(principalId, token, approved);
    if (!result.ok) {
      // Another principal's reply leaves the owner's request in place
      if (result.error !== "wrong-principal") this.pending.delete(token);
      switch (result.error) {
        case "not-found":
        case "wrong-principal":
          return "Unknown confirmation token.";
        case "expired":
          return "That confirmation expired. Send the command again.";
        case "already-resolved":
          return "That confirmation was already answered.";
      }
    }

    const pending = this.pending.get(token);
    this.pending.delete(token);
    if (!approved) return "❎ Cancelled.";
    if (!pending || pending.principalId !== principalId) {
      return "✅ Confirmed. Send the command again to run it.";
    }
    return this.runAction(principalId, { ...pending.request, confirmationToken: token });
  }

  private async runAction(principalId: string, request: ActionRequest): Promise<string> {
    const { decision, output } = await this.options.runner.run(principalId, { origin: "user", ...request });

    if (decision.type === "denied-pending-confirmation") {
      this.pending.set(decision.token, { principalId, request });
    }
    if (decision.type === "denied-pending-delay" && request.confirmationToken) {
      this.scheduleRetry(principalId, request, decision.remainingMs);
    }
    return renderDecision(decision, output);
  }

  /** Re-submit an L4 action once its confirmation delay has passed */
  private scheduleRetry(principalId: string, request: ActionRequest, delayMs: number): void {
    const timer = setTimeout(() => {
      this.retryTimers.delete(timer);
      this.runAction(principalId, request)
        .then((reply) => this.options.dispatcher.notify(principalId, reply))
        .catch((err) => log.error(`Delayed ${request.kind} failed: ${errorMessage(err)}`));
    }, delayMs);
    timer.unref?.();
    this.retryTimers.add(timer);
  }

  private async send(ctx: MsgContext, text: string): Promise<void> {
    const channel = this.options.channels.get(ctx.channel);
    if (!channel) {
      log.error(`Channel not found: ${ctx.channel}`);
      return;
    }
    const target = ctx.chatType === "direct" ? ctx.from : ctx.groupId ?? ctx.from;
    await channel.send(target, { text, replyToId: ctx.fromButton ? undefined : ctx.messageId });
  }
}

export function renderDecision(decision: Decision, output?: ActionOutput): string {
  switch (decision.type) {
    case "granted":
      if (!output) return "✅ Done.";
      return output.ok ? output.text : `⚠️ ${output.error}`;
    case "denied-needs-auth":
      return `🔐 This needs ${levelName(decision.level)}. Send /pin <your PIN> first.`;
    case "denied-blocked":
      return "⛔ Banking and payment actions are permanently blocked.";
    case "denied-pending-confirmation":
      return `📝 Waiting for confirmation (${levelName(decision.level)}). Reply /confirm ${decision.token} or /deny ${decision.token}.`;
    case "denied-pending-delay":
      return `⏳ Confirmed. Running in ${Math.ceil(decision.remainingMs / 1000)}s.`;
    case "system-error":
      return `⚠️ System error (${decision.reason}). Nothing was done.`;
  }
}

export function renderVerify(result: VerifyResult, now: number): string {
  if (result.ok) {
    const minutes = Math.max(1, Math.round((result.expiresAt - now) / 60_000));
    return `✅ PIN verified. Session active for ${minutes} min.`;
  }
  const minutesLeft = (until: number) => Math.max(1, Math.ceil((until - now) / 60_000));
  switch (result.error) {
    case "locked":
      return `🔒 Too many wrong PINs. Try again in ${minutesLeft(result.lockedUntil)} min.`;
    case "no-pin":
    case "invalid-pin":
      if (result.lockedUntil !== undefined) {
        return `🔒 Too many wrong PINs. Locked for ${minutesLeft(result.lockedUntil)} min.`;
      }
      return result.error === "no-pin"
        ? "No PIN is set for you. Run `callward set-pin` on the device."
        : `❌ Wrong PIN. ${result.attemptsRemaining} attempt(s) left.`;
  }
}
