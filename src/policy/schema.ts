/**
 * Zod schema for policy.yml validation
 */

import { z } from "zod";

const levelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

const actionPolicySchema = z.object({
  level: levelSchema,
  description: z.string().optional(),
});

export const policySchema = z.object({
  version: z.literal("1"),
  actions: z.record(z.string(), actionPolicySchema),
  wildcards: z
    .array(actionPolicySchema.extend({ pattern: z.string().min(1) }))
    .optional(),
});

export type PolicyConfig = z.infer<typeof policySchema>;
export type ActionPolicyConfig = z.infer<typeof actionPolicySchema>;
