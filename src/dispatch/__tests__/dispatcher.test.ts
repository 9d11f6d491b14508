import { describe, it, expect, vi, beforeEach } from "vitest";
import { Dispatcher } from "../dispatcher.js";
import { ChannelRegistry } from "../../channels/registry.js";
import { ConfirmationLedger } from "../../gate/confirmations.js";
import { createFakeChannel, type FakeChannel } from "../../channels/__tests__/fake-channel.js";
import type { Action } from "../../policy/types.js";

vi.mock("../../utils/logger.js", () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const T0 = Date.UTC(2026, 0, 1, 9, 0, 0);

function action(overrides: Partial<Action> = {}): Action {
  return {
    kind: "edit_file",
    requiredLevel: 3,
    payload: { path: "notes.txt", content: "hello" },
    requestedAt: T0,
    origin: "user",
    ...overrides,
  };
}

describe("Dispatcher", () => {
  let channel: FakeChannel;
  let channels: ChannelRegistry;
  let ledger: ConfirmationLedger;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    channel = createFakeChannel();
    channels = new ChannelRegistry();
    channels.register(channel.plugin);
    ledger = new ConfirmationLedger({ ttlMs: 300_000, now: () => T0 });
    dispatcher = new Dispatcher({ channels, ledger, l4DelayMs: 10_000 });
  });

  describe("notify", () => {
    it("sends to the user id of the principal", async () => {
      expect(await dispatcher.notify("telegram:1", "hello")).toBe(true);
      expect(channel.sent).toEqual([{ target: "1", message: { text: "hello" } }]);
    });

    it("reports malformed principals and unknown channels", async () => {
      expect(await dispatcher.notify("nobody", "hello")).toBe(false);
      expect(await dispatcher.notify("sms:1", "hello")).toBe(false);
      expect(channel.sent).toEqual([]);
    });

    it("reports a failed send instead of throwing", async () => {
      const failing = createFakeChannel({ failSends: true });
      const registry = new ChannelRegistry();
      registry.register(failing.plugin);
      const d = new Dispatcher({ channels: registry, ledger });

      expect(await d.notify("telegram:1", "hello")).toBe(false);
    });
  });

  describe("requestConfirmation", () => {
    it("issues a token and prompts with buttons", async () => {
      const token = await dispatcher.requestConfirmation("telegram:1", action());

      expect(ledger.get(token)).toMatchObject({ principalId: "telegram:1", actionKind: "edit_file", status: "pending" });
      expect(channel.sent).toEqual([
        {
          target: "1",
          message: {
            text: [
              "**Confirmation required** (L3)",
              "Action: edit_file",
              "path: notes.txt",
              "content: hello",
              `Reply /confirm ${token} or /deny ${token}`,
            ].join("\n"),
            buttons: [
              { text: "Confirm", callbackData: `/confirm ${token}` },
              { text: "Deny", callbackData: `/deny ${token}` },
            ],
          },
        },
      ]);
    });

    it("mentions the delay for L4 actions and truncates long values", async () => {
      const token = await dispatcher.requestConfirmation(
        "telegram:1",
        action({ kind: "make_call", requiredLevel: 4, payload: { number: "5".repeat(90) } }),
      );

      expect(channel.sent[0]?.message.text.split("\n")).toEqual([
        "**Confirmation required** (L4)",
        "Action: make_call",
        `number: ${"5".repeat(80)}…`,
        "After confirming, it runs automatically in 10s.",
        `Reply /confirm ${token} or /deny ${token}`,
      ]);
    });

    it("reuses the pending token for the same action", async () => {
      const first = await dispatcher.requestConfirmation("telegram:1", action());
      const second = await dispatcher.requestConfirmation("telegram:1", action());
      expect(second).toBe(first);
      expect(channel.sent).toHaveLength(2);
      expect(channel.sent[1]?.message.text).toContain(`/confirm ${first}`);
    });

    it("returns the token even when the prompt is not delivered", async () => {
      const d = new Dispatcher({ channels: new ChannelRegistry(), ledger });
      const token = await d.requestConfirmation("telegram:1", action());
      expect(ledger.get(token)?.status).toBe("pending");
    });
  });

  it("resolves answers through the ledger", async () => {
    const token = await dispatcher.requestConfirmation("telegram:1", action());

    expect(dispatcher.resolveConfirmation("telegram:2", token, true)).toEqual({
      ok: false,
      error: "wrong-principal",
    });
    const result = dispatcher.resolveConfirmation("telegram:1", token, true);
    expect(result.ok && result.confirmation.status).toBe("confirmed");
    expect(dispatcher.resolveConfirmation("telegram:1", token, false)).toEqual({
      ok: false,
      error: "already-resolved",
    });
  });
});
