/**
 * Action registry and runner
 *
 * Handlers are registered per action kind at startup. The runner is the
 * only path from a request to a handler: it authorizes first and invokes
 * the handler only on a granted decision.
 */

import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import type { Action, ActionRequest } from "../policy/types.js";
import type { ReadItem } from "../readers/interface.js";
import type { AuthorizationEngine, Decision } from "./engine.js";

const log = createLogger("action-runner");

export interface ActionContext {
  principalId: string;
}

export type ActionOutput =
  | { ok: true; text: string; items?: ReadItem[] }
  | { ok: false; error: string };

export type ActionHandler = (action: Action, ctx: ActionContext) => Promise<ActionOutput>;

export class ActionRegistry {
  private readonly handlers = new Map<string, ActionHandler>();

  register(kind: string, handler: ActionHandler): this {
    if (this.handlers.has(kind)) {
      throw new Error(`Handler already registered for ${kind}`);
    }
    this.handlers.set(kind, handler);
    return this;
  }

  get(kind: string): ActionHandler | undefined {
    return this.handlers.get(kind);
  }

  has(kind: string): boolean {
    return this.handlers.has(kind);
  }

  kinds(): string[] {
    return [...this.handlers.keys()].sort();
  }
}

export interface RunResult {
  decision: Decision;
  /** Present only when the decision was granted and a handler ran */
  output?: ActionOutput;
}

export class ActionRunner {
  constructor(
    private readonly engine: AuthorizationEngine,
    private readonly registry: ActionRegistry,
  ) {}

  async run(principalId: string, request: ActionRequest): Promise<RunResult> {
    const decision = await this.engine.authorize(principalId, request);
    if (decision.type !== "granted") return { decision };

    const handler = this.registry.get(request.kind);
    if (!handler) {
      log.warn(`No handler registered for granted action ${request.kind}`);
      return { decision, output: { ok: false, error: `No handler for ${request.kind}` } };
    }

    try {
      const output = await handler(decision.action, { principalId });
      return { decision, output };
    } catch (err) {
      log.error(`Handler for ${request.kind} failed: ${errorMessage(err)}`);
      return { decision, output: { ok: false, error: errorMessage(err) } };
    }
  }
}
