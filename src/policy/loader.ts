/**
 * Policy loader - loads and validates policy.yml
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { policySchema, type PolicyConfig } from "./schema.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("policy-loader");

export const BUNDLED_POLICY_PATH = fileURLToPath(
  new URL("../../data/policy.yml", import.meta.url),
);

export function parsePolicy(content: string, source: string): PolicyConfig {
  const raw: unknown = YAML.parse(content);
  const result = policySchema.safeParse(raw);
  if (!result.success) {
    log.error("Policy validation failed", result.error.errors);
    throw new Error(
      `Invalid policy (${source}): ${result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    );
  }
  return result.data;
}

/**
 * Load the policy file, falling back to the bundled default when it does
 * not exist. A file that exists but fails validation is an error.
 */
export async function loadPolicyConfig(policyPath?: string): Promise<PolicyConfig> {
  if (policyPath) {
    try {
      log.info(`Loading policy from ${policyPath}`);
      const content = await readFile(policyPath, "utf-8");
      return parsePolicy(content, policyPath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
      log.warn(`Policy file not found: ${policyPath}, using bundled default`);
    }
  }

  const content = await readFile(BUNDLED_POLICY_PATH, "utf-8");
  return parsePolicy(content, BUNDLED_POLICY_PATH);
}
