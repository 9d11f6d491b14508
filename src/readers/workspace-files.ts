/**
 * FileStore rooted at a workspace directory
 *
 * Paths are relative to the root. Absolute paths, `..` escapes and symlinks
 * are refused.
 */

import { lstat, mkdir, readFile, realpath, rename, writeFile } from "node:fs/promises";
import { dirname, relative, resolve } from "node:path";
import type { FileStore } from "./interface.js";

export class WorkspacePathError extends Error {
  constructor(path: string) {
    super(`Path outside workspace: ${path}`);
    this.name = "WorkspacePathError";
  }
}

function isInside(root: string, target: string, allowRoot = false): boolean {
  const rel = relative(root, target).replace(/\\/g, "/");
  if (rel === "") return allowRoot;
  return !rel.startsWith("..") && !rel.startsWith("/");
}

/** Realpath of the closest existing ancestor of a path that does not exist yet */
async function existingAncestor(absPath: string): Promise<string> {
  let dir = dirname(absPath);
  for (;;) {
    try {
      return await realpath(dir);
    } catch (err) {
      const parent = dirname(dir);
      if ((err as NodeJS.ErrnoException).code !== "ENOENT" || parent === dir) throw err;
      dir = parent;
    }
  }
}

async function resolveWorkspacePath(root: string, relativePath: string): Promise<string> {
  if (!relativePath || relativePath.includes("\0") || relativePath.startsWith("/")) {
    throw new WorkspacePathError(relativePath);
  }

  const absRoot = resolve(root);
  const absPath = resolve(absRoot, relativePath);
  if (!isInside(absRoot, absPath)) throw new WorkspacePathError(relativePath);

  await mkdir(absRoot, { recursive: true });
  const realRoot = await realpath(absRoot);

  let exists = true;
  try {
    const stats = await lstat(absPath);
    if (stats.isSymbolicLink() || !stats.isFile()) throw new WorkspacePathError(relativePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    exists = false;
  }

  // Symlinked directories on the way must not lead out of the root either
  const real = exists ? await realpath(absPath) : await existingAncestor(absPath);
  if (!isInside(realRoot, real, !exists)) throw new WorkspacePathError(relativePath);
  return absPath;
}

export function createWorkspaceFiles(root: string): FileStore {
  return {
    async read(path) {
      return readFile(await resolveWorkspacePath(root, path), "utf-8");
    },

    async write(path, content) {
      const absPath = await resolveWorkspacePath(root, path);
      await mkdir(dirname(absPath), { recursive: true });
      const tmpPath = absPath + ".tmp";
      await writeFile(tmpPath, content, "utf-8");
      await rename(tmpPath, absPath);
    },
  };
}
