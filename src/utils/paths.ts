import { homedir } from "node:os";
import { join, resolve } from "node:path";

/**
 * Ensure CALLWARD_HOME is set so `${CALLWARD_HOME}` defaults in config expand.
 * Returns the resolved home directory.
 */
export function ensureCallwardHomeEnv(): string {
  const existing = process.env.CALLWARD_HOME?.trim();
  if (existing) return resolvePathLike(existing);

  const home = join(homedir(), ".callward");
  process.env.CALLWARD_HOME = home;
  return home;
}

export function defaultConfigPath(): string {
  return join(ensureCallwardHomeEnv(), "callward.yaml");
}

/** Expand a leading `~` and resolve to an absolute path. */
export function resolvePathLike(path: string, baseDir = process.cwd()): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? homedir();
  if (path === "~") return home;
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return resolve(baseDir, path);
}
