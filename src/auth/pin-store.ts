/**
 * PinStore
 *
 * Salted PBKDF2-SHA256 PIN hashes per principal.
 *
 * - Store file: <dataDir>/pins.json  ({ [principalId]: "<salt>$<hash>" })
 * - Writes: tmp file + rename
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { pbkdf2, randomBytes, timingSafeEqual } from "node:crypto";
import { promisify } from "node:util";
import { createLogger } from "../utils/logger.js";

const log = createLogger("pin-store");
const pbkdf2Async = promisify(pbkdf2);

const PIN_PATTERN = /^\d{4,12}$/;

export interface PinStore {
  has(principalId: string): Promise<boolean>;
  /** Compare in constant time. False when no PIN is set. */
  check(principalId: string, pin: string): Promise<boolean>;
  set(principalId: string, pin: string): Promise<void>;
}

export interface PinStoreOptions {
  storePath: string;
  /** PBKDF2 iterations (default 100_000) */
  iterations?: number;
}

type StoreFile = Record<string, string>;

export function isValidPinFormat(pin: string): boolean {
  return PIN_PATTERN.test(pin);
}

export function createPinStore(options: PinStoreOptions): PinStore {
  const { storePath } = options;
  const iterations = options.iterations ?? 100_000;
  let cache: StoreFile | null = null;

  async function hash(pin: string, salt: string): Promise<Buffer> {
    return pbkdf2Async(pin, salt, iterations, 32, "sha256");
  }

  async function readStore(): Promise<StoreFile> {
    if (cache) return cache;
    try {
      const raw = await readFile(storePath, "utf-8");
      const parsed: unknown = raw.trim() ? JSON.parse(raw) : {};
      const store: StoreFile = {};
      if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === "string") store[key] = value;
        }
      }
      cache = store;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
      cache = {};
    }
    return cache;
  }

  async function writeStoreAtomic(data: StoreFile): Promise<void> {
    await mkdir(dirname(storePath), { recursive: true });
    const tmpPath = storePath + ".tmp";
    await writeFile(tmpPath, JSON.stringify(data, null, 2), { encoding: "utf-8", mode: 0o600 });
    await rename(tmpPath, storePath);
  }

  return {
    async has(principalId) {
      const store = await readStore();
      return principalId in store;
    },

    async check(principalId, pin) {
      const store = await readStore();
      const stored = store[principalId];
      if (!stored) return false;

      const [salt, expectedHex] = stored.split("$");
      if (!salt || !expectedHex) {
        log.error(`Corrupt PIN entry for ${principalId}`);
        return false;
      }
      const expected = Buffer.from(expectedHex, "hex");
      const actual = await hash(pin, salt);
      return actual.length === expected.length && timingSafeEqual(actual, expected);
    },

    async set(principalId, pin) {
      if (!isValidPinFormat(pin)) {
        throw new Error("PIN must be 4-12 digits");
      }
      const salt = randomBytes(16).toString("hex");
      const digest = await hash(pin, salt);
      const store = { ...(await readStore()), [principalId]: `${salt}$${digest.toString("hex")}` };
      await writeStoreAtomic(store);
      cache = store;
      log.info(`PIN set for ${principalId}`);
    },
  };
}
