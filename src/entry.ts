#!/usr/bin/env node
/**
 * callward entry point
 */

import { program } from "commander";
import { join, dirname } from "node:path";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { createInterface } from "node:readline/promises";
import { z } from "zod";
import { loadConfig, dataPaths } from "./config/loader.js";
import { startGateway } from "./gateway/server.js";
import { logger } from "./utils/logger.js";
import { defaultConfigPath, ensureCallwardHomeEnv } from "./utils/paths.js";
import { createPinStore, isValidPinFormat } from "./auth/pin-store.js";
import { AuditLog } from "./audit/logger.js";
import { verifyArchives } from "./audit/query.js";
import { parsePrincipalId } from "./channels/interface.js";

const log = logger;

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = z
  .object({ name: z.string(), version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")));

const nodeMajor = Number.parseInt(process.versions.node.split(".")[0] ?? "0", 10);
if (Number.isNaN(nodeMajor) || nodeMajor < 20) {
  log.error(`Node.js ${process.versions.node} is not supported. Please upgrade to >= 20.0.0.`);
  process.exit(1);
}

const configOption = [
  "-c, --config <path>",
  "Config file path (default: $CALLWARD_HOME/callward.yaml)",
  process.env.CALLWARD_CONFIG_PATH ?? defaultConfigPath(),
] as const;

program
  .name("callward")
  .description("On-device assistant with PIN-gated actions and call auto-pickup")
  .version(pkg.version);

program
  .command("start")
  .description("Start the assistant")
  .option(...configOption)
  .action(async (options: { config: string }) => {
    try {
      ensureCallwardHomeEnv();
      log.info("Starting callward...");

      const config = await loadConfig(options.config);
      const stopGateway = await startGateway({ config });

      const shutdown = async () => {
        log.info("Shutting down...");
        try {
          await stopGateway();
        } catch (err) {
          log.error("Error stopping gateway", err);
        }
        process.exit(0);
      };

      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);

      log.info(`callward v${pkg.version} is running. Press Ctrl+C to stop.`);
    } catch (err) {
      log.error("Failed to start", err);
      process.exit(1);
    }
  });

program
  .command("set-pin")
  .description("Set the PIN for a principal (read from stdin)")
  .argument("<principal>", 'principal id, e.g. "telegram:123456"')
  .option(...configOption)
  .action(async (principal: string, options: { config: string }) => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      if (!parsePrincipalId(principal)) {
        throw new Error(`Invalid principal id: ${principal}`);
      }
      const config = await loadConfig(options.config);
      const pin = (await rl.question("New PIN (4-12 digits): ")).trim();
      if (!isValidPinFormat(pin)) {
        throw new Error("PIN must be 4-12 digits");
      }

      const pins = createPinStore({ storePath: dataPaths(config).pins });
      await pins.set(principal, pin);
      log.info(`PIN set for ${principal}`);
    } catch (err) {
      log.error("Failed to set PIN", err);
      process.exitCode = 1;
    } finally {
      rl.close();
    }
  });

function parseDateOption(flag: string, value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) throw new Error(`Invalid ${flag} date: ${value}`);
  return date;
}

const outcomeSchema = z.enum(["granted", "denied", "blocked", "error"]);

program
  .command("audit")
  .description("Print audit records as JSON lines")
  .option("--kind <kind>", "Filter by action kind")
  .option("--outcome <outcome>", "Filter by outcome (granted|denied|blocked|error)")
  .option("--principal <id>", "Filter by principal id")
  .option("--since <iso>", "Only records at or after this time")
  .option("--until <iso>", "Only records at or before this time")
  .option("--limit <n>", "Only the most recent n records")
  .option("--verify", "Check archives against the integrity ledger instead of printing records")
  .option(...configOption)
  .action(
    async (options: {
      kind?: string;
      outcome?: string;
      principal?: string;
      since?: string;
      until?: string;
      limit?: string;
      verify?: boolean;
      config: string;
    }) => {
      try {
        const config = await loadConfig(options.config);
        const paths = dataPaths(config);
        if (options.verify) {
          const checks = await verifyArchives(paths.auditArchiveDir);
          for (const check of checks) {
            process.stdout.write(`${check.status}\t${check.file}\n`);
          }
          if (checks.some((check) => check.status === "mismatch")) process.exitCode = 1;
          return;
        }

        const audit = new AuditLog({ logPath: paths.auditLog, archiveDir: paths.auditArchiveDir });

        const since = parseDateOption("--since", options.since);
        const until = parseDateOption("--until", options.until);
        const limit = options.limit ? Number.parseInt(options.limit, 10) : undefined;
        if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
          throw new Error(`Invalid --limit: ${options.limit}`);
        }

        const records = await audit.query({
          actionKind: options.kind,
          outcome: options.outcome ? outcomeSchema.parse(options.outcome) : undefined,
          principalId: options.principal,
          since,
          until,
          limit,
        });
        for (const record of records) {
          process.stdout.write(JSON.stringify(record) + "\n");
        }
      } catch (err) {
        log.error("Failed to read audit log", err);
        process.exitCode = 1;
      }
    },
  );

await program.parseAsync();
