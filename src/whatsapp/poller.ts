/**
 * WhatsApp poller - forwards important messages to the owner
 *
 * Every tick runs poll_whatsapp as a system action through the runner, so
 * the gate and the audit trail see each poll. Financial messages are
 * dropped; important ones are forwarded with financial data redacted.
 */

import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import type { ActionRunner } from "../gate/actions.js";
import type { BankingGuard } from "../policy/banking.js";
import type { ReadItem } from "../readers/interface.js";
import type { Notifier } from "../dispatch/dispatcher.js";
import type { ImportanceDetector } from "./importance.js";

const log = createLogger("whatsapp-poller");

export interface PollResult {
  status: "ok" | "skipped" | "denied" | "failed";
  forwarded: number;
  dropped: number;
  ignored: number;
}

export interface WhatsAppPollerOptions {
  runner: ActionRunner;
  owner: string;
  notifier: Notifier;
  guard: BankingGuard;
  detector: ImportanceDetector;
  intervalMs: number;
  now?: () => number;
}

const EMPTY: Omit<PollResult, "status"> = { forwarded: 0, dropped: 0, ignored: 0 };

export class WhatsAppPoller {
  private readonly options: WhatsAppPollerOptions;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private lastSeen: number;

  constructor(options: WhatsAppPollerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.lastSeen = this.now();
  }

  start(): void {
    if (this.timer) return;
    log.info(`Polling WhatsApp every ${this.options.intervalMs / 1000}s`);
    this.timer = setInterval(() => {
      this.tick().catch((err) => log.error(`WhatsApp poll failed: ${errorMessage(err)}`));
    }, this.options.intervalMs);
    this.timer.unref?.();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One poll. A tick that starts while another is running is skipped. */
  async tick(): Promise<PollResult> {
    if (this.running) return { status: "skipped", ...EMPTY };
    this.running = true;
    try {
      return await this.poll();
    } finally {
      this.running = false;
    }
  }

  private async poll(): Promise<PollResult> {
    const { decision, output } = await this.options.runner.run(this.options.owner, {
      kind: "poll_whatsapp",
      origin: "system",
      payload: { since: this.lastSeen },
    });

    if (decision.type !== "granted") {
      log.warn(`WhatsApp poll not authorized: ${decision.type}`);
      return { status: "denied", ...EMPTY };
    }
    if (!output || !output.ok) {
      log.warn(`WhatsApp poll failed: ${output && !output.ok ? output.error : "no output"}`);
      return { status: "failed", ...EMPTY };
    }

    const result: PollResult = { status: "ok", ...EMPTY };
    for (const item of output.items ?? []) {
      this.lastSeen = Math.max(this.lastSeen, item.at);
      await this.handle(item, result);
    }
    return result;
  }

  private async handle(item: ReadItem, result: PollResult): Promise<void> {
    const { guard, detector } = this.options;
    if (guard.scanText(item.text).financial) {
      result.dropped++;
      return;
    }

    const analysis = detector.analyze(item);
    if (!analysis.important) {
      result.ignored++;
      return;
    }

    const sent = await this.options.notifier.notify(
      this.options.owner,
      `💬 **WhatsApp from ${item.from ?? "unknown"}**\n${guard.redact(item.text)}`,
    );
    if (sent) result.forwarded++;
    log.info(`Forwarded important message (score ${analysis.score}: ${analysis.reasons.join(", ")})`);
  }
}
