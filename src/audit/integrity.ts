/**
 * Archive integrity ledger
 *
 * Each rotated archive gets a SHA-256 line in <archiveDir>/integrity.jsonl
 * when it is written. Reading the archives back compares them against it.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { appendFile, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";

const log = createLogger("audit-integrity");

export const INTEGRITY_FILE = "integrity.jsonl";

const entrySchema = z.object({
  file: z.string(),
  sha256: z.string(),
  ts: z.string(),
});

export type IntegrityEntry = z.infer<typeof entrySchema>;

export type ArchiveStatus = "ok" | "mismatch" | "unrecorded";

export interface ArchiveCheck {
  file: string;
  status: ArchiveStatus;
}

export async function sha256File(path: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export async function recordArchiveHash(archiveDir: string, archivePath: string, at: Date): Promise<IntegrityEntry> {
  const entry: IntegrityEntry = {
    file: basename(archivePath),
    sha256: await sha256File(archivePath),
    ts: at.toISOString(),
  };
  await appendFile(join(archiveDir, INTEGRITY_FILE), JSON.stringify(entry) + "\n", "utf-8");
  return entry;
}

/** file name -> recorded hash; the last entry for a name wins */
export async function loadIntegrityLedger(archiveDir: string): Promise<Map<string, string>> {
  const hashes = new Map<string, string>();
  let text: string;
  try {
    text = await readFile(join(archiveDir, INTEGRITY_FILE), "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return hashes;
    throw err;
  }

  for (const line of text.split("\n")) {
    if (!line.trim()) continue;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      log.warn("Skipping malformed integrity line");
      continue;
    }
    const parsed = entrySchema.safeParse(json);
    if (parsed.success) {
      hashes.set(parsed.data.file, parsed.data.sha256);
    } else {
      log.warn("Skipping malformed integrity line");
    }
  }
  return hashes;
}

export async function checkArchive(ledger: Map<string, string>, archivePath: string): Promise<ArchiveCheck> {
  const file = basename(archivePath);
  const recorded = ledger.get(file);
  if (!recorded) return { file, status: "unrecorded" };
  const actual = await sha256File(archivePath);
  if (actual !== recorded) {
    log.warn(`Audit archive ${file} does not match its recorded hash`);
    return { file, status: "mismatch" };
  }
  return { file, status: "ok" };
}
