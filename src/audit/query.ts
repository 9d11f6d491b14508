/**
 * Audit file reader - current log plus rotated archives
 */

import { createReadStream } from "node:fs";
import { access, readdir } from "node:fs/promises";
import { join } from "node:path";
import { createGunzip } from "node:zlib";
import { createInterface } from "node:readline";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import type { AuditRecord } from "./logger.js";
import { checkArchive, loadIntegrityLedger, type ArchiveCheck } from "./integrity.js";

const log = createLogger("audit-query");

const auditRecordSchema = z.object({
  id: z.string(),
  ts: z.string(),
  event: z.enum(["decision", "auth"]),
  principalId: z.string(),
  actionKind: z.string(),
  requiredLevel: z
    .union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)])
    .optional(),
  outcome: z.enum(["granted", "denied", "blocked", "error"]),
  reason: z.string(),
  payload: z.record(z.string(), z.unknown()).optional(),
});

/** Rotated archives, oldest first by name */
async function listArchives(archiveDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(archiveDir, { encoding: "utf-8" });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    log.debug("No archive directory found");
    return [];
  }
  return names
    .filter((name) => name.startsWith("audit-") && (name.endsWith(".jsonl.gz") || name.endsWith(".jsonl")))
    .sort()
    .map((name) => join(archiveDir, name));
}

/** Reads every file; archives that fail their integrity check are still read, with a warning */
export async function readAuditFiles(logPath: string, archiveDir?: string): Promise<AuditRecord[]> {
  const records: AuditRecord[] = [];
  if (archiveDir) {
    const ledger = await loadIntegrityLedger(archiveDir);
    for (const file of await listArchives(archiveDir)) {
      await checkArchive(ledger, file);
      records.push(...(await readAuditFile(file)));
    }
  }
  records.push(...(await readAuditFile(logPath)));
  return records;
}

export async function verifyArchives(archiveDir: string): Promise<ArchiveCheck[]> {
  const ledger = await loadIntegrityLedger(archiveDir);
  const checks: ArchiveCheck[] = [];
  for (const file of await listArchives(archiveDir)) {
    checks.push(await checkArchive(ledger, file));
  }
  return checks;
}

async function readAuditFile(file: string): Promise<AuditRecord[]> {
  try {
    await access(file);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }

  const records: AuditRecord[] = [];
  const source = createReadStream(file);
  const stream = file.endsWith(".gz") ? source.pipe(createGunzip()) : source;
  const rl = createInterface({ input: stream, crlfDelay: Infinity });

  for await (const line of rl) {
    if (!line.trim()) continue;
    const parsed = auditRecordSchema.safeParse(safeJson(line));
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      log.warn(`Skipping malformed audit line in ${file}`);
    }
  }

  return records;
}

function safeJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}
