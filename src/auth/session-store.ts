/**
 * SessionStore
 *
 * Per-principal PIN authentication state: verified level, sliding expiry,
 * failed-attempt counter and lockout.
 *
 * - Mutations (verify, touch, logout) are serialized per principal
 * - Snapshot file: <dataDir>/sessions.json, rewritten after each mutation
 * - Expiry is evaluated lazily on read; there is no sweeper
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { KeyedLock } from "./keyed-lock.js";
import type { PinStore } from "./pin-store.js";
import { MAX_VERIFIABLE_LEVEL, PermissionLevel } from "../policy/types.js";

const log = createLogger("session-store");

export interface Session {
  principalId: string;
  verifiedLevel: PermissionLevel;
  expiresAt: number;
  failedAttempts: number;
  lockedUntil?: number;
}

export type VerifyResult =
  | { ok: true; level: PermissionLevel; expiresAt: number }
  | { ok: false; error: "invalid-pin" | "no-pin"; attemptsRemaining: number; lockedUntil?: number }
  | { ok: false; error: "locked"; lockedUntil: number };

export interface SessionStoreOptions {
  pins: PinStore;
  sessionTimeoutMs: number;
  maxPinRetries: number;
  lockoutMs: number;
  /** Snapshot file; omit for a memory-only store */
  snapshotPath?: string;
  now?: () => number;
}

const snapshotSchema = z.record(
  z.string(),
  z.object({
    principalId: z.string(),
    verifiedLevel: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
    expiresAt: z.number(),
    failedAttempts: z.number().int().nonnegative(),
    lockedUntil: z.number().optional(),
  }),
);

function freshSession(principalId: string): Session {
  return {
    principalId,
    verifiedLevel: PermissionLevel.L1,
    expiresAt: 0,
    failedAttempts: 0,
  };
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly lock = new KeyedLock();
  private readonly pins: PinStore;
  private readonly sessionTimeoutMs: number;
  private readonly maxPinRetries: number;
  private readonly lockoutMs: number;
  private readonly snapshotPath: string | undefined;
  private readonly now: () => number;
  private persistChain: Promise<void> = Promise.resolve();

  constructor(options: SessionStoreOptions) {
    this.pins = options.pins;
    this.sessionTimeoutMs = options.sessionTimeoutMs;
    this.maxPinRetries = options.maxPinRetries;
    this.lockoutMs = options.lockoutMs;
    this.snapshotPath = options.snapshotPath;
    this.now = options.now ?? Date.now;
  }

  /** Restore sessions persisted by a previous process */
  async load(): Promise<void> {
    if (!this.snapshotPath) return;
    let raw: string;
    try {
      raw = await readFile(this.snapshotPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn(`Session snapshot unreadable, starting empty: ${errorMessage(err)}`);
      return;
    }
    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      log.warn("Session snapshot failed validation, starting empty");
      return;
    }
    for (const [principalId, session] of Object.entries(parsed.data)) {
      this.sessions.set(principalId, { ...session });
    }
    log.info(`Restored ${this.sessions.size} session(s)`);
  }

  async getOrCreate(principalId: string): Promise<Session> {
    return this.lock.run(principalId, () => ({ ...this.ensure(principalId) }));
  }

  /** Current snapshot of a session, if one exists */
  peek(principalId: string): Session | undefined {
    const session = this.sessions.get(principalId);
    return session ? { ...session } : undefined;
  }

  isValid(principalId: string): boolean {
    const session = this.sessions.get(principalId);
    return session !== undefined && this.now() < session.expiresAt;
  }

  /** Verified level, or L1 when the session is missing or expired */
  effectiveLevel(principalId: string): PermissionLevel {
    const session = this.sessions.get(principalId);
    if (!session || !this.isValid(principalId)) return PermissionLevel.L1;
    return session.verifiedLevel;
  }

  async verify(principalId: string, pin: string): Promise<VerifyResult> {
    return this.lock.run(principalId, async () => {
      const session = this.ensure(principalId);
      const now = this.now();

      if (session.lockedUntil !== undefined) {
        if (session.lockedUntil > now) {
          log.warn(`PIN attempt for ${principalId} rejected: locked out`);
          return { ok: false, error: "locked", lockedUntil: session.lockedUntil };
        }
        delete session.lockedUntil;
      }

      const hasPin = await this.pins.has(principalId);
      const matched = hasPin && (await this.pins.check(principalId, pin));

      if (!matched) {
        session.failedAttempts += 1;
        const error = hasPin ? "invalid-pin" : "no-pin";
        const attemptsRemaining = Math.max(this.maxPinRetries - session.failedAttempts, 0);

        if (session.failedAttempts >= this.maxPinRetries) {
          const lockedUntil = now + this.lockoutMs;
          Object.assign(session, freshSession(principalId), { lockedUntil });
          log.warn(`Principal ${principalId} locked out until ${new Date(lockedUntil).toISOString()}`);
          await this.persist();
          return { ok: false, error, attemptsRemaining, lockedUntil };
        }
        await this.persist();
        return { ok: false, error, attemptsRemaining };
      }

      session.verifiedLevel = MAX_VERIFIABLE_LEVEL;
      session.expiresAt = now + this.sessionTimeoutMs;
      session.failedAttempts = 0;
      delete session.lockedUntil;
      await this.persist();
      log.info(`Principal ${principalId} verified`);
      return { ok: true, level: session.verifiedLevel, expiresAt: session.expiresAt };
    });
  }

  /**
   * Slide the expiry window of a valid session. Never changes the level.
   * Returns false when there is no valid session to extend.
   */
  async touch(principalId: string): Promise<boolean> {
    return this.lock.run(principalId, async () => {
      if (!this.isValid(principalId)) return false;
      const session = this.ensure(principalId);
      session.expiresAt = this.now() + this.sessionTimeoutMs;
      await this.persist();
      return true;
    });
  }

  async logout(principalId: string): Promise<void> {
    await this.lock.run(principalId, async () => {
      const session = this.sessions.get(principalId);
      if (!session) return;
      const { lockedUntil } = session;
      Object.assign(session, freshSession(principalId));
      if (lockedUntil !== undefined) session.lockedUntil = lockedUntil;
      await this.persist();
      log.info(`Principal ${principalId} logged out`);
    });
  }

  private ensure(principalId: string): Session {
    let session = this.sessions.get(principalId);
    if (!session) {
      session = freshSession(principalId);
      this.sessions.set(principalId, session);
    }
    return session;
  }

  private async persist(): Promise<void> {
    const path = this.snapshotPath;
    if (!path) return;

    const data: Record<string, Session> = {};
    for (const [id, session] of this.sessions) data[id] = { ...session };

    const write = async () => {
      await mkdir(dirname(path), { recursive: true });
      const tmpPath = path + ".tmp";
      await writeFile(tmpPath, JSON.stringify(data, null, 2), "utf-8");
      await rename(tmpPath, path);
    };

    this.persistChain = this.persistChain.then(write).catch((err) => {
      log.error(`Failed to persist sessions: ${errorMessage(err)}`);
    });
    await this.persistChain;
  }
}
