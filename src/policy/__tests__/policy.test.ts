import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PermissionPolicy } from "../policy.js";
import { BankingGuard, loadBundledBankingData } from "../banking.js";
import { loadPolicyConfig, parsePolicy } from "../loader.js";
import { UnknownActionError } from "../../utils/errors.js";
import { PermissionLevel } from "../types.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

describe("PermissionPolicy", () => {
  let policy: PermissionPolicy;

  beforeAll(async () => {
    const guard = new BankingGuard(loadBundledBankingData(), ["com.mybank.*"]);
    policy = new PermissionPolicy(await loadPolicyConfig(), guard);
  });

  it("resolves exact kinds to their level", () => {
    expect(policy.resolve("get_time")).toBe(PermissionLevel.L1);
    expect(policy.resolve("read_sms")).toBe(PermissionLevel.L2);
    expect(policy.resolve("edit_file")).toBe(PermissionLevel.L3);
    expect(policy.resolve("call_pickup")).toBe(PermissionLevel.L4);
    expect(policy.resolve("upi_payment")).toBe(PermissionLevel.L5);
  });

  it("falls back to wildcard rules", () => {
    expect(policy.resolve("payment_card")).toBe(PermissionLevel.L5);
  });

  it("rejects unknown kinds instead of defaulting", () => {
    expect(() => policy.resolve("launch_rocket")).toThrow(UnknownActionError);
    expect(() => policy.resolve("launch_rocket")).toThrow("Unknown action: launch_rocket");
  });

  it("blocks L5 kinds and banking app identifiers", () => {
    expect(policy.isBlocked("banking_transfer")).toBe(true);
    expect(policy.isBlocked("payment_wallet")).toBe(true);
    expect(policy.isBlocked("com.phonepe.app")).toBe(true);
    expect(policy.isBlocked("read_sms")).toBe(false);
    expect(policy.isBlocked("launch_rocket")).toBe(false);
  });

  it("matches blocked targets exactly, by name, by glob and by package prefix", () => {
    expect(policy.isBlockedTarget("net.one97.paytm")).toBe(true);
    expect(policy.isBlockedTarget("PhonePe")).toBe(true);
    expect(policy.isBlockedTarget("com.mybank.retail")).toBe(true);
    expect(policy.isBlockedTarget("com.phonepe.app.v4")).toBe(true);
    expect(policy.isBlockedTarget("com.phonepe")).toBe(false);
    expect(policy.isBlockedTarget("org.example.notes")).toBe(false);
  });

  it("describes actions sorted by level then kind", () => {
    const kinds = policy.describe().map((def) => def.kind);
    expect(kinds.slice(0, 4)).toEqual(["get_time", "help", "list_tasks", "query_status"]);
    expect(kinds[kinds.length - 1]).toBe("upi_payment");
  });

  it("is frozen after construction", () => {
    expect(Object.isFrozen(policy)).toBe(true);
  });
});

describe("policy loader", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "callward-policy-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses the bundled policy when the file is missing", async () => {
    const config = await loadPolicyConfig(join(dir, "missing.yml"));
    expect(config.version).toBe("1");
    expect(config.actions.make_call?.level).toBe(4);
  });

  it("loads a custom policy file", async () => {
    const path = join(dir, "policy.yml");
    await writeFile(path, 'version: "1"\nactions:\n  ping: { level: 1 }\n', "utf-8");
    const config = await loadPolicyConfig(path);
    expect(Object.keys(config.actions)).toEqual(["ping"]);
  });

  it("rejects a policy with an out-of-range level", () => {
    expect(() => parsePolicy('version: "1"\nactions:\n  ping: { level: 7 }\n', "inline")).toThrow(
      /^Invalid policy \(inline\): actions\.ping\.level/,
    );
  });
});
