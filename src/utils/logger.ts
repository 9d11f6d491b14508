/**
 * Logger utility
 *
 * LOG_LEVEL picks the threshold (trace, debug, info, warn, error; default
 * info). LOG_FILE, when set, also receives one line per record.
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

// tslog numbering
const LEVELS: Record<string, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export function minLevelFor(name: string | undefined): number {
  return LEVELS[(name ?? "").toLowerCase()] ?? 3;
}

function fileLine(logObj: ILogObj): string {
  const meta = logObj["_meta"];
  const ts =
    typeof meta === "object" && meta !== null && "date" in meta
      ? String(meta.date)
      : new Date().toISOString();
  const parts = Object.values(logObj).filter(
    (v) => typeof v === "string" || typeof v === "number",
  );
  return `${ts} ${parts.join(" ")}\n`;
}

function fileTransports(logFile: string | undefined): ((logObj: ILogObj) => void)[] {
  if (!logFile) return [];

  try {
    mkdirSync(dirname(logFile), { recursive: true });
  } catch (err) {
    process.stderr.write(`[logger] cannot create ${dirname(logFile)}: ${String(err)}\n`);
    return [];
  }

  return [
    (logObj: ILogObj) => {
      try {
        appendFileSync(logFile, fileLine(logObj));
      } catch (err) {
        // Writing through the logger here would recurse.
        process.stderr.write(`[logger] file transport failed: ${String(err)}\n`);
      }
    },
  ];
}

export const logger = new Logger<ILogObj>({
  name: "callward",
  minLevel: minLevelFor(process.env.LOG_LEVEL),
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: fileTransports(process.env.LOG_FILE),
});

export type AppLogger = Logger<ILogObj>;

export function createLogger(name: string): AppLogger {
  return logger.getSubLogger({ name });
}
