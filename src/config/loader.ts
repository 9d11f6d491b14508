/**
 * Config loader with environment variable expansion
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { resolve, dirname, join } from "node:path";
import { ZodError } from "zod";
import { configSchema, type Config } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { ensureCallwardHomeEnv, resolvePathLike } from "../utils/paths.js";
import { expandEnvVarsDeep } from "./expand-env.js";

const log = createLogger("config");

/** Files the assistant keeps under its data directory */
export interface DataPaths {
  dataDir: string;
  auditLog: string;
  auditArchiveDir: string;
  sessions: string;
  pins: string;
  callNotes: string;
  policy: string;
  filesRoot: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readYaml(path: string): Promise<unknown> {
  return parse(await readFile(path, "utf-8"));
}

export async function loadConfig(path: string): Promise<Config> {
  // Ensure CALLWARD_HOME is always defined so ${CALLWARD_HOME} defaults expand.
  ensureCallwardHomeEnv();

  const expandedPath = resolvePathLike(path);
  log.info(`Loading config from ${expandedPath}`);

  let raw: unknown;
  try {
    raw = await readYaml(expandedPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Config file not found: ${expandedPath}`);
    }
    throw err;
  }
  const configDir = dirname(expandedPath);

  // Optional <configDir>/secrets.yaml keeps tokens out of the main file
  let secrets: unknown = null;
  try {
    secrets = await readYaml(join(configDir, "secrets.yaml"));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      throw err;
    }
  }

  // Priority: config value > secrets.telegram.token > env var
  if (isRecord(raw)) {
    const telegram = isRecord(raw.telegram) ? { ...raw.telegram } : {};
    if (!telegram.token) {
      const secretTelegram = isRecord(secrets) && isRecord(secrets.telegram) ? secrets.telegram : {};
      const token = secretTelegram.token ?? process.env.TELEGRAM_BOT_TOKEN;
      if (typeof token === "string" && token) telegram.token = token;
    }
    raw = { ...raw, telegram };
  }

  // Expand environment variables on user-provided values (before schema defaults apply).
  // Schema defaults may also contain ${VARS}; we expand again after parse.
  let config: Config;
  try {
    config = configSchema.parse(expandEnvVarsDeep(raw, process.env));
    config = configSchema.parse(expandEnvVarsDeep(config, process.env));
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(formatZodError(err));
    }
    throw err;
  }

  config.dataDir = resolvePathLike(config.dataDir, configDir);
  if (config.policy.path) config.policy.path = resolvePathLike(config.policy.path, configDir);
  if (config.files.root) config.files.root = resolvePathLike(config.files.root, configDir);
  log.debug(`Resolved data directory: ${config.dataDir}`);

  log.info("Config loaded successfully");
  return config;
}

export function dataPaths(config: Config): DataPaths {
  const dataDir = resolve(config.dataDir);
  return {
    dataDir,
    auditLog: join(dataDir, "audit.jsonl"),
    auditArchiveDir: join(dataDir, "audit"),
    sessions: join(dataDir, "sessions.json"),
    pins: join(dataDir, "pins.json"),
    callNotes: join(dataDir, "calls.jsonl"),
    policy: config.policy.path ?? join(dataDir, "policy.yml"),
    filesRoot: config.files.root ?? join(dataDir, "files"),
  };
}

export function formatZodError(error: ZodError): string {
  const lines = error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `- ${path}: ${issue.message}`;
  });
  return `Config validation failed:\n${lines.join("\n")}`;
}
