/**
 * Permission level types for action gating
 *
 * L1 auto, L2 PIN, L3 PIN + confirmation, L4 PIN + confirmation + delay,
 * L5 permanently denied (banking / payments).
 */

export const PermissionLevel = {
  L1: 1,
  L2: 2,
  L3: 3,
  L4: 4,
  L5: 5,
} as const;

export type PermissionLevel = (typeof PermissionLevel)[keyof typeof PermissionLevel];

/** Highest level a PIN can prove. L5 is never reachable. */
export const MAX_VERIFIABLE_LEVEL: PermissionLevel = PermissionLevel.L4;

export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}

export function levelName(level: PermissionLevel): string {
  return `L${level}`;
}

/** Registered definition of a gated action kind */
export interface ActionDefinition {
  kind: string;
  level: PermissionLevel;
  description: string;
}

export type ActionOrigin = "user" | "system";

/** What a caller submits. The level is never caller-supplied. */
export interface ActionRequest {
  kind: string;
  payload?: Record<string, unknown>;
  /** Token from a confirmation the user already answered */
  confirmationToken?: string;
  origin?: ActionOrigin;
  requestedAt?: number;
}

/** An action after policy resolution */
export interface Action {
  kind: string;
  requiredLevel: PermissionLevel;
  payload: Record<string, unknown>;
  requestedAt: number;
  confirmationToken?: string;
  origin: ActionOrigin;
}
