import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createWorkspaceFiles, WorkspacePathError } from "../workspace-files.js";
import type { FileStore } from "../interface.js";

describe("workspace files", () => {
  let dir: string;
  let root: string;
  let outside: string;
  let files: FileStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "callward-files-"));
    root = join(dir, "root");
    outside = join(dir, "outside");
    await mkdir(root);
    await mkdir(outside);
    await writeFile(join(outside, "secret.txt"), "keep out", "utf-8");
    files = createWorkspaceFiles(root);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes and reads files under the root", async () => {
    await files.write("notes/today.txt", "buy milk");

    expect(await files.read("notes/today.txt")).toBe("buy milk");
    expect(existsSync(join(root, "notes", "today.txt.tmp"))).toBe(false);
  });

  it("replaces existing content", async () => {
    await files.write("a.txt", "one");
    await files.write("a.txt", "two");
    expect(await readFile(join(root, "a.txt"), "utf-8")).toBe("two");
  });

  it("refuses absolute paths and escapes", async () => {
    await expect(files.write("/etc/passwd", "x")).rejects.toThrow(WorkspacePathError);
    await expect(files.write("../outside/new.txt", "x")).rejects.toThrow("Path outside workspace: ../outside/new.txt");
    await expect(files.read("")).rejects.toThrow(WorkspacePathError);
    expect(existsSync(join(outside, "new.txt"))).toBe(false);
  });

  it("refuses symlinked files", async () => {
    await symlink(join(outside, "secret.txt"), join(root, "link.txt"));
    await expect(files.read("link.txt")).rejects.toThrow(WorkspacePathError);
  });

  it("refuses paths through a symlinked directory", async () => {
    await symlink(outside, join(root, "out"), "dir");

    await expect(files.read("out/secret.txt")).rejects.toThrow(WorkspacePathError);
    await expect(files.write("out/new.txt", "x")).rejects.toThrow(WorkspacePathError);
    expect(existsSync(join(outside, "new.txt"))).toBe(false);
  });

  it("refuses directories", async () => {
    await mkdir(join(root, "sub"));
    await expect(files.read("sub")).rejects.toThrow(WorkspacePathError);
  });
});
