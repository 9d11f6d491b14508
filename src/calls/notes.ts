/**
 * Call notes - completed call summaries, one JSON object per line
 */

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import type { CallSummary } from "./types.js";

const log = createLogger("call-notes");

const utteranceSchema = z.object({
  speaker: z.enum(["assistant", "caller"]),
  text: z.string(),
  at: z.number(),
});

const summarySchema = z.object({
  callId: z.string(),
  caller: z.object({ number: z.string(), name: z.string().optional() }),
  startedAt: z.number(),
  durationMs: z.number(),
  transcript: z.array(utteranceSchema),
  actionItems: z.array(z.string()),
  summary: z.string(),
  sentiment: z.enum(["urgent", "negative", "positive", "neutral"]),
  endReason: z.enum(["hangup", "goodbye", "silence", "max-duration", "timeout", "unavailable", "error"]),
  incomplete: z.boolean(),
  blockedRequests: z.array(z.string()),
});

export class CallNotesStore {
  private dirReady = false;

  constructor(private readonly notesPath: string) {}

  async append(summary: CallSummary): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.notesPath), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.notesPath, JSON.stringify(summary) + "\n", "utf-8");
    log.info(`Saved notes for call ${summary.callId}`);
  }

  /** Most recent calls first */
  async list(limit = 10): Promise<CallSummary[]> {
    if (limit <= 0) return [];
    let raw: string;
    try {
      raw = await readFile(this.notesPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const notes: CallSummary[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      const parsed = summarySchema.safeParse(safeJson(line));
      if (parsed.success) notes.push(parsed.data);
      else log.warn("Skipping malformed call note");
    }
    return notes.slice(-limit).reverse();
  }
}

function safeJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}
