/**
 * Built-in action handlers
 *
 * One handler per action kind that has a backend on this device. Kinds
 * without a handler (send_message, write_calendar, ...) still pass through
 * the gate and report that nothing can run them.
 */

import type { AuditLog } from "../audit/logger.js";
import type { CallNotesStore } from "../calls/notes.js";
import type { TelephonyPort } from "../capabilities/interface.js";
import type { PermissionPolicy } from "../policy/policy.js";
import { levelName } from "../policy/types.js";
import type { FileStore, ReadItem, ReaderId, ReaderSet } from "../readers/interface.js";
import type { ActionHandler, ActionOutput, ActionRegistry } from "./actions.js";

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 50;

export interface BuiltinHandlerDeps {
  policy: PermissionPolicy;
  audit: AuditLog;
  notes: CallNotesStore;
  readers: ReaderSet;
  files?: FileStore;
  telephony?: TelephonyPort;
  /** Status text for query_status */
  status: (principalId: string) => string;
  now?: () => number;
}

export function stringField(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function limitField(payload: Record<string, unknown>): number {
  const value = payload.limit;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) return DEFAULT_LIMIT;
  return Math.min(value, MAX_LIMIT);
}

function formatItems(items: ReadItem[], redact: (text: string) => string): string {
  if (items.length === 0) return "Nothing found.";
  return items
    .map((item) => {
      const at = new Date(item.at).toISOString().slice(0, 16).replace("T", " ");
      return `- [${at}] ${item.from ? `${item.from}: ` : ""}${redact(item.text)}`;
    })
    .join("\n");
}

function readerHandler(id: ReaderId, deps: BuiltinHandlerDeps): ActionHandler {
  return async (action) => {
    const reader = deps.readers[id];
    if (!reader) return { ok: false, error: `No ${id} reader configured` };
    const items = await reader.read({
      text: stringField(action.payload, "query"),
      limit: limitField(action.payload),
    });
    return { ok: true, text: formatItems(items, (t) => deps.policy.guard.redact(t)), items };
  };
}

export function registerBuiltinHandlers(registry: ActionRegistry, deps: BuiltinHandlerDeps): ActionRegistry {
  const now = deps.now ?? Date.now;

  registry.register("query_status", async (_action, ctx) => ({ ok: true, text: deps.status(ctx.principalId) }));

  registry.register("help", async () => {
    const lines = deps.policy.describe().map((def) => `- ${def.kind} (${levelName(def.level)}): ${def.description}`);
    return { ok: true, text: ["**Actions**", ...lines].join("\n") };
  });

  registry.register("get_time", async () => ({ ok: true, text: new Date(now()).toString() }));

  // Open tasks are the action items of recent calls
  registry.register("list_tasks", async (action) => {
    const notes = await deps.notes.list(limitField(action.payload));
    const tasks = notes.flatMap((note) =>
      note.actionItems.map((item) => `- ${item} (${note.caller.name ?? note.caller.number})`),
    );
    return { ok: true, text: tasks.length > 0 ? tasks.join("\n") : "No open tasks." };
  });

  registry.register("read_whatsapp", readerHandler("whatsapp", deps));
  registry.register("read_sms", readerHandler("sms", deps));
  registry.register("read_calendar", readerHandler("calendar", deps));
  registry.register("read_contacts", readerHandler("contacts", deps));

  registry.register("poll_whatsapp", async (action) => {
    const reader = deps.readers.whatsapp;
    if (!reader) return { ok: false, error: "No whatsapp reader configured" };
    const since = action.payload.since;
    const items = await reader.read(typeof since === "number" ? { since } : {});
    return { ok: true, text: `${items.length} new message(s)`, items };
  });

  registry.register("read_call_log", async (action) => {
    const notes = await deps.notes.list(limitField(action.payload));
    if (notes.length === 0) return { ok: true, text: "No calls recorded." };
    const lines = notes.map((note) => {
      const at = new Date(note.startedAt).toISOString().slice(0, 16).replace("T", " ");
      const who = note.caller.name ?? note.caller.number;
      return `- [${at}] ${who}: ${note.summary}`;
    });
    return { ok: true, text: lines.join("\n") };
  });

  registry.register("read_audit_log", async (action) => {
    const records = await deps.audit.query({ limit: limitField(action.payload) });
    if (records.length === 0) return { ok: true, text: "Audit log is empty." };
    const lines = records.map((r) => `- ${r.ts} ${r.principalId} ${r.actionKind} ${r.outcome} (${r.reason})`);
    return { ok: true, text: lines.join("\n") };
  });

  registry.register("read_file", async (action): Promise<ActionOutput> => {
    if (!deps.files) return { ok: false, error: "No file store configured" };
    const path = stringField(action.payload, "path");
    if (!path) return { ok: false, error: "read_file needs a path" };
    const content = await deps.files.read(path);
    return { ok: true, text: content ? deps.policy.guard.redact(content) : `${path} is empty.` };
  });

  registry.register("edit_file", async (action): Promise<ActionOutput> => {
    if (!deps.files) return { ok: false, error: "No file store configured" };
    const path = stringField(action.payload, "path");
    const content = action.payload.content;
    if (!path || typeof content !== "string") {
      return { ok: false, error: "edit_file needs a path and content" };
    }
    await deps.files.write(path, content);
    return { ok: true, text: `Wrote ${content.length} characters to ${path}` };
  });

  registry.register("make_call", async (action): Promise<ActionOutput> => {
    if (!deps.telephony) return { ok: false, error: "Telephony not available" };
    const number = stringField(action.payload, "number");
    if (!number) return { ok: false, error: "make_call needs a number" };
    await deps.telephony.dial(number);
    return { ok: true, text: `Calling ${number}` };
  });

  return registry;
}
