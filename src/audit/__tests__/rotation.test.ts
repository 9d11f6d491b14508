import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, mkdir, readdir, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { createHash } from "node:crypto";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AuditRotation, type AuditRotationOptions } from "../rotation.js";
import { verifyArchives } from "../query.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const NOW = Date.UTC(2026, 0, 10, 0, 0, 0);
const DAY = 24 * 60 * 60 * 1000;

async function setMtime(path: string, ms: number): Promise<void> {
  await utimes(path, ms / 1000, ms / 1000);
}

describe("AuditRotation", () => {
  let dir: string;
  let logPath: string;
  let archiveDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "callward-rotation-"));
    logPath = join(dir, "audit.jsonl");
    archiveDir = join(dir, "audit");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function rotationWith(extra: Partial<AuditRotationOptions> = {}): AuditRotation {
    return new AuditRotation({ logPath, archiveDir, now: () => NOW, ...extra });
  }

  it("skips a missing log file", async () => {
    expect(await rotationWith().rotateIfDue()).toBe(false);
  });

  it("leaves a small, fresh log alone", async () => {
    await writeFile(logPath, '{"id":"1"}\n');
    await setMtime(logPath, NOW);

    expect(await rotationWith().rotateIfDue()).toBe(false);
    expect(existsSync(logPath)).toBe(true);
  });

  it("does not archive an old but empty log", async () => {
    await writeFile(logPath, "");
    await setMtime(logPath, NOW - 2 * DAY);

    expect(await rotationWith().rotateIfDue()).toBe(false);
  });

  it("rotates an old log into a gzip archive after draining the queue", async () => {
    await writeFile(logPath, '{"id":"1"}\n');
    await setMtime(logPath, NOW - 2 * DAY);
    const beforeRotate = vi.fn(async () => {});

    expect(await rotationWith({ beforeRotate }).rotateIfDue()).toBe(true);
    expect(beforeRotate).toHaveBeenCalledTimes(1);
    expect(existsSync(logPath)).toBe(false);
    expect((await readdir(archiveDir)).sort()).toEqual([`audit-2026-01-10-${NOW}.jsonl.gz`, "integrity.jsonl"]);
  });

  it("rotates by size", async () => {
    await writeFile(logPath, "x".repeat(2048));
    await setMtime(logPath, NOW);
    const rotation = rotationWith({ maxSizeMb: 0.001, compress: false });

    expect(await rotation.rotateIfDue()).toBe(true);
    expect((await readdir(archiveDir)).sort()).toEqual([`audit-2026-01-10-${NOW}.jsonl`, "integrity.jsonl"]);
  });

  it("shares one run between overlapping checks", async () => {
    await writeFile(logPath, "x".repeat(2048));
    const rotation = rotationWith({ maxSizeMb: 0.001, compress: false });

    const [first, second] = await Promise.all([rotation.rotateIfDue(), rotation.rotateIfDue()]);
    expect([first, second]).toEqual([true, true]);
    expect((await readdir(archiveDir)).sort()).toEqual([`audit-2026-01-10-${NOW}.jsonl`, "integrity.jsonl"]);
  });

  it("records the archive hash and detects a later edit", async () => {
    await writeFile(logPath, '{"id":"1"}\n');
    const rotation = rotationWith({ maxSizeMb: 0.000001, compress: false });
    const archivePath = await rotation.rotate();

    const ledger = (await readFile(join(archiveDir, "integrity.jsonl"), "utf-8")).trim().split("\n");
    expect(ledger.map((line) => JSON.parse(line))).toEqual([
      {
        file: `audit-2026-01-10-${NOW}.jsonl`,
        sha256: createHash("sha256").update('{"id":"1"}\n').digest("hex"),
        ts: new Date(NOW).toISOString(),
      },
    ]);
    expect(await verifyArchives(archiveDir)).toEqual([{ file: `audit-2026-01-10-${NOW}.jsonl`, status: "ok" }]);

    await writeFile(archivePath, '{"id":"2"}\n');
    expect(await verifyArchives(archiveDir)).toEqual([
      { file: `audit-2026-01-10-${NOW}.jsonl`, status: "mismatch" },
    ]);
  });

  it("reports archives the ledger does not know", async () => {
    await mkdir(archiveDir);
    await writeFile(join(archiveDir, "audit-2025-12-31-1.jsonl"), "{}\n");
    expect(await verifyArchives(archiveDir)).toEqual([{ file: "audit-2025-12-31-1.jsonl", status: "unrecorded" }]);
  });

  it("prunes nothing when there is no archive directory", async () => {
    expect(await rotationWith().prune()).toEqual([]);
  });

  it("deletes archives by age only", async () => {
    await mkdir(archiveDir);
    const old = join(archiveDir, "audit-2025-11-01-1.jsonl.gz");
    const recent = join(archiveDir, "audit-2026-01-09-2.jsonl.gz");
    const other = join(archiveDir, "notes.txt");
    for (const path of [old, recent, other]) await writeFile(path, "x");
    await setMtime(old, NOW - 40 * DAY);
    await setMtime(recent, NOW - DAY);
    await setMtime(other, NOW - 40 * DAY);

    expect(await rotationWith({ keepDays: 30 }).prune()).toEqual(["audit-2025-11-01-1.jsonl.gz"]);
    expect((await readdir(archiveDir)).sort()).toEqual(["audit-2026-01-09-2.jsonl.gz", "notes.txt"]);
  });
});
