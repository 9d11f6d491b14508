/**
 * Audit log archival
 *
 * The live file is moved into the archive directory once it is too big or
 * too old, then gzipped and its hash added to the integrity ledger.
 * Archives are pruned by age only; nothing ever rewrites a record.
 */

import { stat, rename, unlink, mkdir, readdir } from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import { join } from "node:path";
import { createGzip } from "node:zlib";
import { pipeline } from "node:stream/promises";
import { createLogger } from "../utils/logger.js";
import { recordArchiveHash } from "./integrity.js";

const log = createLogger("audit-rotation");

const MB = 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;
const ARCHIVE_PREFIX = "audit-";

export interface AuditRotationOptions {
  logPath: string;
  archiveDir: string;
  /** default 50 */
  maxSizeMb?: number;
  /** Age of the live file that forces a rotation (default 1 day) */
  maxAgeDays?: number;
  /** Archives older than this are deleted (default 30) */
  keepDays?: number;
  compress?: boolean;
  /** Runs before the live file is moved, so queued records land in the archive */
  beforeRotate?: () => Promise<void>;
  now?: () => number;
}

type RotationReason = { kind: "size"; sizeMb: number } | { kind: "age"; ageHours: number };

export class AuditRotation {
  private readonly logPath: string;
  private readonly archiveDir: string;
  private readonly maxSizeMb: number;
  private readonly maxAgeMs: number;
  private readonly keepMs: number;
  private readonly compress: boolean;
  private readonly beforeRotate?: () => Promise<void>;
  private readonly now: () => number;
  private running: Promise<boolean> | null = null;

  constructor(options: AuditRotationOptions) {
    this.logPath = options.logPath;
    this.archiveDir = options.archiveDir;
    this.maxSizeMb = options.maxSizeMb ?? 50;
    this.maxAgeMs = (options.maxAgeDays ?? 1) * DAY_MS;
    this.keepMs = (options.keepDays ?? 30) * DAY_MS;
    this.compress = options.compress ?? true;
    this.beforeRotate = options.beforeRotate;
    this.now = options.now ?? Date.now;
  }

  /** Rotate when due. Overlapping calls share one run. */
  rotateIfDue(): Promise<boolean> {
    if (!this.running) {
      this.running = this.check().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async check(): Promise<boolean> {
    const reason = await this.dueReason();
    if (!reason) return false;

    if (reason.kind === "size") {
      log.info(`Audit log is ${reason.sizeMb.toFixed(2)}MB, rotating`);
    } else {
      log.info(`Audit log is ${reason.ageHours.toFixed(1)}h old, rotating`);
    }
    await this.rotate();
    return true;
  }

  private async dueReason(): Promise<RotationReason | null> {
    let size: number;
    let mtimeMs: number;
    try {
      ({ size, mtimeMs } = await stat(this.logPath));
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }

    const sizeMb = size / MB;
    if (sizeMb >= this.maxSizeMb) return { kind: "size", sizeMb };
    const ageMs = this.now() - mtimeMs;
    if (size > 0 && ageMs >= this.maxAgeMs) return { kind: "age", ageHours: ageMs / (60 * 60 * 1000) };
    return null;
  }

  /** Move the live file into the archive. Returns the archive path. */
  async rotate(): Promise<string> {
    if (this.beforeRotate) await this.beforeRotate();
    await mkdir(this.archiveDir, { recursive: true });

    // Same-day rotations stay distinct and sort by time
    const at = new Date(this.now());
    const day = at.toISOString().slice(0, 10);
    const archivePath = join(this.archiveDir, `${ARCHIVE_PREFIX}${day}-${at.getTime()}.jsonl`);

    await rename(this.logPath, archivePath);
    log.info(`Archived audit log to ${archivePath}`);

    const finalPath = this.compress ? await gzipInPlace(archivePath) : archivePath;
    await recordArchiveHash(this.archiveDir, finalPath, at);
    await this.prune();
    return finalPath;
  }

  /** Delete archives past the retention window. Returns the deleted names. */
  async prune(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.archiveDir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const deleted: string[] = [];
    for (const name of names.filter((n) => n.startsWith(ARCHIVE_PREFIX)).sort()) {
      const path = join(this.archiveDir, name);
      const { mtimeMs } = await stat(path);
      if (this.now() - mtimeMs <= this.keepMs) continue;
      await unlink(path);
      deleted.push(name);
      log.info(`Deleted expired archive ${name}`);
    }
    return deleted;
  }

  /** Check on an interval. Returns a function that stops the checks. */
  schedule(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.rotateIfDue()
        .then(() => this.prune())
        .catch((err) => log.error("Audit rotation failed", err));
    }, intervalMs);
    timer.unref?.();
    return () => clearInterval(timer);
  }
}

async function gzipInPlace(path: string): Promise<string> {
  const gzPath = `${path}.gz`;
  await pipeline(createReadStream(path), createGzip(), createWriteStream(gzPath));
  await unlink(path);
  return gzPath;
}
