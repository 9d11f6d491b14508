/**
 * Configuration schema (Zod)
 */

import { z } from "zod";
import { parsePrincipalId } from "../channels/interface.js";

const seconds = (fallback: number) => z.number().int().positive().default(fallback);

export const contactSchema = z.object({
  number: z.string().min(1),
  name: z.string().min(1),
  relation: z.string().optional(),
});

export const authConfigSchema = z
  .object({
    sessionTimeoutSeconds: seconds(300),
    maxPinRetries: z.number().int().positive().default(3),
    lockoutSeconds: seconds(900),
    /** Wait between confirming and running an L4 action */
    l4DelaySeconds: z.number().int().nonnegative().default(10),
    confirmationTtlSeconds: seconds(300),
  })
  .refine((auth) => auth.l4DelaySeconds < auth.confirmationTtlSeconds, {
    message: "l4DelaySeconds must be shorter than confirmationTtlSeconds",
    path: ["l4DelaySeconds"],
  })
  .default({});

export const policyConfigSchema = z
  .object({
    /** Defaults to <dataDir>/policy.yml; the bundled table is used when missing */
    path: z.string().optional(),
    /** Added to the bundled banking blocklist. Exact ids or globs. */
    bankingBlocklist: z.array(z.string()).default([]),
  })
  .default({});

export const callsConfigSchema = z
  .object({
    autoPickupEnabled: z.boolean().default(true),
    autoPickupDelaySeconds: seconds(20),
    turnTimeoutSeconds: seconds(10),
    maxDurationSeconds: seconds(180),
    maxSilentTurns: z.number().int().positive().default(2),
    ownerName: z.string().min(1).default("the owner"),
    contacts: z.array(contactSchema).default([]),
  })
  .default({});

export const whatsappConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    pollIntervalSeconds: seconds(5),
  })
  .default({});

export const auditConfigSchema = z
  .object({
    queueLimit: z.number().int().positive().default(1000),
    keepDays: z.number().int().positive().default(30),
    /** Rotate the live file once it reaches this size */
    maxSizeMb: z.number().positive().default(50),
  })
  .default({});

export const filesConfigSchema = z
  .object({
    /** Root for edit_file. Defaults to <dataDir>/files */
    root: z.string().optional(),
  })
  .default({});

export const telegramConfigSchema = z
  .object({
    // token can come from secrets.yaml or TELEGRAM_BOT_TOKEN
    token: z.string().optional(),
    /** Principals ("telegram:123") or bare Telegram user ids allowed besides the owner */
    allowList: z.array(z.string()).default([]),
  })
  .default({});

export const configSchema = z.object({
  owner: z
    .string()
    .refine((value) => parsePrincipalId(value) !== null, {
      message: 'owner must be a principal id like "telegram:123456"',
    }),
  dataDir: z.string().default("${CALLWARD_HOME}"),
  auth: authConfigSchema,
  policy: policyConfigSchema,
  calls: callsConfigSchema,
  whatsapp: whatsappConfigSchema,
  audit: auditConfigSchema,
  files: filesConfigSchema,
  telegram: telegramConfigSchema,
});

export type Config = z.infer<typeof configSchema>;
export type CallsConfig = z.infer<typeof callsConfigSchema>;
export type ContactConfig = z.infer<typeof contactSchema>;
