import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SessionStore, type SessionStoreOptions } from "../session-store.js";
import type { PinStore } from "../pin-store.js";
import { PermissionLevel } from "../../policy/types.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const T0 = Date.UTC(2026, 0, 1, 9, 0, 0);
const ALICE = "telegram:1";

function memoryPins(entries: Record<string, string>): PinStore & { checks: number } {
  const store = {
    checks: 0,
    async has(principalId: string) {
      return principalId in entries;
    },
    async check(principalId: string, pin: string) {
      store.checks++;
      return entries[principalId] === pin;
    },
    async set(principalId: string, pin: string) {
      entries[principalId] = pin;
    },
  };
  return store;
}

describe("SessionStore", () => {
  let clock: number;
  let pins: ReturnType<typeof memoryPins>;

  function createStore(overrides: Partial<SessionStoreOptions> = {}): SessionStore {
    return new SessionStore({
      pins,
      sessionTimeoutMs: 300_000,
      maxPinRetries: 3,
      lockoutMs: 900_000,
      now: () => clock,
      ...overrides,
    });
  }

  beforeEach(() => {
    clock = T0;
    pins = memoryPins({ [ALICE]: "1234" });
  });

  it("starts unverified", async () => {
    const store = createStore();
    expect(await store.getOrCreate(ALICE)).toEqual({
      principalId: ALICE,
      verifiedLevel: PermissionLevel.L1,
      expiresAt: 0,
      failedAttempts: 0,
    });
    expect(store.effectiveLevel(ALICE)).toBe(PermissionLevel.L1);
  });

  it("verifies a correct PIN up to L4", async () => {
    const store = createStore();
    const result = await store.verify(ALICE, "1234");

    expect(result).toEqual({ ok: true, level: PermissionLevel.L4, expiresAt: T0 + 300_000 });
    expect(store.isValid(ALICE)).toBe(true);
    expect(store.effectiveLevel(ALICE)).toBe(PermissionLevel.L4);
  });

  it("expires exactly at the timeout", async () => {
    const store = createStore();
    await store.verify(ALICE, "1234");

    clock = T0 + 299_999;
    expect(store.isValid(ALICE)).toBe(true);
    clock = T0 + 300_000;
    expect(store.isValid(ALICE)).toBe(false);
    clock = T0 + 301_000;
    expect(store.effectiveLevel(ALICE)).toBe(PermissionLevel.L1);
  });

  it("counts wrong PINs and resets the count on success", async () => {
    const store = createStore();
    expect(await store.verify(ALICE, "0000")).toEqual({ ok: false, error: "invalid-pin", attemptsRemaining: 2 });
    expect(await store.verify(ALICE, "0000")).toEqual({ ok: false, error: "invalid-pin", attemptsRemaining: 1 });
    await store.verify(ALICE, "1234");
    expect(store.peek(ALICE)?.failedAttempts).toBe(0);
  });

  it("locks out after the retry limit without consulting the PIN", async () => {
    const store = createStore();
    await store.verify(ALICE, "0000");
    await store.verify(ALICE, "0000");
    const third = await store.verify(ALICE, "0000");
    expect(third).toEqual({
      ok: false,
      error: "invalid-pin",
      attemptsRemaining: 0,
      lockedUntil: T0 + 900_000,
    });

    const checksBefore = pins.checks;
    clock = T0 + 60_000;
    expect(await store.verify(ALICE, "1234")).toEqual({ ok: false, error: "locked", lockedUntil: T0 + 900_000 });
    expect(pins.checks).toBe(checksBefore);
    expect(store.peek(ALICE)).toEqual({
      principalId: ALICE,
      verifiedLevel: PermissionLevel.L1,
      expiresAt: 0,
      failedAttempts: 0,
      lockedUntil: T0 + 900_000,
    });

    clock = T0 + 900_000;
    expect((await store.verify(ALICE, "1234")).ok).toBe(true);
    expect(store.peek(ALICE)?.lockedUntil).toBeUndefined();
  });

  it("serializes concurrent attempts for one principal", async () => {
    const store = createStore({ maxPinRetries: 2 });
    const results = await Promise.all([
      store.verify(ALICE, "1111"),
      store.verify(ALICE, "2222"),
      store.verify(ALICE, "1234"),
    ]);

    expect(results[0]).toEqual({ ok: false, error: "invalid-pin", attemptsRemaining: 1 });
    expect(results[1]).toEqual({
      ok: false,
      error: "invalid-pin",
      attemptsRemaining: 0,
      lockedUntil: T0 + 900_000,
    });
    expect(results[2]).toEqual({ ok: false, error: "locked", lockedUntil: T0 + 900_000 });
  });

  it("reports a missing PIN", async () => {
    const store = createStore();
    expect(await store.verify("telegram:2", "1234")).toEqual({
      ok: false,
      error: "no-pin",
      attemptsRemaining: 2,
    });
  });

  it("slides the expiry on touch without changing the level", async () => {
    const store = createStore();
    await store.verify(ALICE, "1234");

    clock = T0 + 200_000;
    expect(await store.touch(ALICE)).toBe(true);
    expect(await store.touch(ALICE)).toBe(true);
    expect(store.peek(ALICE)?.expiresAt).toBe(T0 + 500_000);
    expect(store.effectiveLevel(ALICE)).toBe(PermissionLevel.L4);
  });

  it("does not revive an expired session on touch", async () => {
    const store = createStore();
    await store.verify(ALICE, "1234");
    clock = T0 + 301_000;
    expect(await store.touch(ALICE)).toBe(false);
    expect(store.isValid(ALICE)).toBe(false);
  });

  it("logs out but keeps an active lockout", async () => {
    const store = createStore({ maxPinRetries: 1 });
    await store.verify(ALICE, "0000");
    await store.logout(ALICE);
    expect(store.peek(ALICE)?.lockedUntil).toBe(T0 + 900_000);

    const other = createStore();
    await other.verify(ALICE, "1234");
    await other.logout(ALICE);
    expect(other.isValid(ALICE)).toBe(false);
  });

  describe("snapshot", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "callward-sessions-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("restores sessions and lockouts after restart", async () => {
      const snapshotPath = join(dir, "sessions.json");
      const first = createStore({ snapshotPath });
      await first.verify(ALICE, "1234");
      pins = memoryPins({ "telegram:2": "9999" });
      const locked = createStore({ snapshotPath, maxPinRetries: 1 });
      await locked.load();
      await locked.verify("telegram:2", "0000");

      const restored = createStore({ snapshotPath });
      await restored.load();
      expect(restored.effectiveLevel(ALICE)).toBe(PermissionLevel.L4);
      expect(restored.peek("telegram:2")?.lockedUntil).toBe(T0 + 900_000);

      const onDisk = JSON.parse(await readFile(snapshotPath, "utf-8"));
      expect(Object.keys(onDisk).sort()).toEqual([ALICE, "telegram:2"]);
    });

    it("treats an expired snapshot as no session", async () => {
      const snapshotPath = join(dir, "sessions.json");
      await createStore({ snapshotPath }).verify(ALICE, "1234");

      clock = T0 + 600_000;
      const restored = createStore({ snapshotPath });
      await restored.load();
      expect(restored.isValid(ALICE)).toBe(false);
    });

    it("starts empty when there is no snapshot", async () => {
      const restored = createStore({ snapshotPath: join(dir, "missing.json") });
      await restored.load();
      expect(restored.peek(ALICE)).toBeUndefined();
    });
  });
});
