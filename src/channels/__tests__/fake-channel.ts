// In-process chat channel for tests: records sends, injects inbound messages.
import { vi } from "vitest";
import type { ChannelPlugin, MessageHandler, MsgContext, OutboundMessage } from "../interface.js";

export interface SentMessage {
  target: string;
  message: OutboundMessage;
}

export interface FakeChannel {
  plugin: ChannelPlugin;
  sent: SentMessage[];
  /** Deliver an inbound message to the registered handler */
  receive(body: string, overrides?: Partial<MsgContext>): Promise<void>;
}

export function createFakeChannel(options: { failSends?: boolean } = {}): FakeChannel {
  const sent: SentMessage[] = [];
  let handler: MessageHandler | null = null;
  let nextId = 1;

  const plugin: ChannelPlugin = {
    id: "telegram",
    start: vi.fn(async () => {}),
    stop: vi.fn(async () => {}),
    onMessage: vi.fn((h: MessageHandler) => {
      handler = h;
    }),
    send: vi.fn(async (target: string, message: OutboundMessage) => {
      if (options.failSends) throw new Error("network down");
      sent.push({ target, message });
    }),
    capabilities: { buttons: true, markdown: true, maxMessageLength: 4096 },
  };

  return {
    plugin,
    sent,
    async receive(body, overrides = {}) {
      if (!handler) throw new Error("no message handler registered");
      await handler({
        from: "1",
        senderName: "Asha",
        body,
        messageId: String(nextId++),
        channel: "telegram",
        chatType: "direct",
        timestamp: 0,
        ...overrides,
      });
    },
  };
}
