/**
 * Audit log - append-only JSONL trail of gate decisions and auth events
 *
 * append() never waits on storage: records go into a bounded in-memory queue
 * that a background drain writes to disk. A failed write keeps the batch
 * queued and retries it (at-least-once; readers dedupe by id). A full queue
 * refuses the record so the caller can fail closed.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { monotonicFactory } from "ulid";
import { redactPayload } from "./redact.js";
import { readAuditFiles } from "./query.js";
import { createLogger } from "../utils/logger.js";
import { AuditUnavailableError, errorMessage } from "../utils/errors.js";
import type { PermissionLevel } from "../policy/types.js";

const log = createLogger("audit");
const nextId = monotonicFactory();

export type AuditOutcome = "granted" | "denied" | "blocked" | "error";
export type AuditEvent = "decision" | "auth";

export interface AuditRecord {
  id: string;
  ts: string;
  event: AuditEvent;
  principalId: string;
  actionKind: string;
  requiredLevel?: PermissionLevel;
  outcome: AuditOutcome;
  reason: string;
  payload?: Record<string, unknown>;
}

export type AuditRecordInput = Omit<AuditRecord, "id" | "ts">;

export interface AppendResult {
  ok: boolean;
  id: string;
  error?: string;
}

export interface AuditFilter {
  actionKind?: string;
  outcome?: AuditOutcome;
  principalId?: string;
  event?: AuditEvent;
  since?: Date;
  until?: Date;
  /** Keep only the most recent N matches */
  limit?: number;
}

export interface AuditLogOptions {
  logPath: string;
  archiveDir?: string;
  /** Max records waiting for disk before append() refuses (default 1000) */
  queueLimit?: number;
  /** Delay before retrying a failed write (default 1000ms) */
  retryDelayMs?: number;
  /** Clock for record timestamps */
  now?: () => number;
  /** Storage writer; defaults to appending to logPath */
  write?: (data: string) => Promise<void>;
}

export class AuditLog {
  private readonly logPath: string;
  private readonly archiveDir: string | undefined;
  private readonly queueLimit: number;
  private readonly retryDelayMs: number;
  private readonly now: () => number;
  private readonly write: (data: string) => Promise<void>;

  private queue: AuditRecord[] = [];
  private draining: Promise<void> | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private degraded = false;
  private dirReady = false;

  constructor(options: AuditLogOptions) {
    this.logPath = options.logPath;
    this.archiveDir = options.archiveDir;
    this.queueLimit = options.queueLimit ?? 1000;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.now = options.now ?? Date.now;
    this.write = options.write ?? ((data) => this.appendToFile(data));
  }

  /**
   * Enqueue a record. The only mutator; returns immediately.
   */
  append(input: AuditRecordInput): AppendResult {
    const id = nextId(this.now());

    if (this.queue.length >= this.queueLimit) {
      this.degraded = true;
      log.error(`Audit queue full (${this.queueLimit}), refusing record for ${input.actionKind}`);
      return { ok: false, id, error: "audit queue full" };
    }

    const record: AuditRecord = {
      ...input,
      id,
      ts: new Date(this.now()).toISOString(),
      ...(input.payload ? { payload: redactPayload(input.payload) } : {}),
    };
    this.queue.push(record);
    this.kick();
    return { ok: true, id };
  }

  /** Wait until every queued record is on disk. Throws if storage keeps failing. */
  async flush(): Promise<void> {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    if (this.queue.length > 0) this.kick();
    if (this.draining) await this.draining;
    if (this.queue.length > 0) {
      throw new AuditUnavailableError(`${this.queue.length} audit records not persisted`);
    }
  }

  async query(filter: AuditFilter = {}): Promise<AuditRecord[]> {
    const persisted = await readAuditFiles(this.logPath, this.archiveDir);
    const seen = new Set<string>();
    const all: AuditRecord[] = [];
    for (const record of [...persisted, ...this.queue]) {
      if (seen.has(record.id)) continue;
      seen.add(record.id);
      all.push(record);
    }

    const matches = all
      .filter((r) => matchesFilter(r, filter))
      .sort((a, b) => a.id.localeCompare(b.id));
    return filter.limit !== undefined ? matches.slice(-filter.limit) : matches;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  pendingCount(): number {
    return this.queue.length;
  }

  async close(): Promise<void> {
    await this.flush();
  }

  private kick(): void {
    if (this.draining || this.retryTimer) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
    });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0) {
      const batch = this.queue.slice();
      const data = batch.map((r) => JSON.stringify(r)).join("\n") + "\n";
      try {
        await this.write(data);
      } catch (err) {
        this.degraded = true;
        log.error(`Audit write failed, ${batch.length} records kept for retry: ${errorMessage(err)}`);
        this.scheduleRetry();
        return;
      }
      this.queue.splice(0, batch.length);
      if (this.degraded) {
        this.degraded = false;
        log.info("Audit queue flushed, audit system recovered");
      }
    }
  }

  private scheduleRetry(): void {
    if (this.retryTimer) return;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.kick();
    }, this.retryDelayMs);
    this.retryTimer.unref?.();
  }

  private async appendToFile(data: string): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.logPath), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.logPath, data, "utf-8");
  }
}

function matchesFilter(record: AuditRecord, filter: AuditFilter): boolean {
  if (filter.actionKind && record.actionKind !== filter.actionKind) return false;
  if (filter.outcome && record.outcome !== filter.outcome) return false;
  if (filter.principalId && record.principalId !== filter.principalId) return false;
  if (filter.event && record.event !== filter.event) return false;

  const ts = new Date(record.ts).getTime();
  if (filter.since && ts < filter.since.getTime()) return false;
  if (filter.until && ts > filter.until.getTime()) return false;
  return true;
}
