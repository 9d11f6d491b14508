/**
 * Channel plugin interface
 *
 * A channel is the chat transport the owner talks to the assistant through.
 * Principals are addressed as "<channel>:<userId>".
 */

export type ChannelId = "telegram";

export interface ChannelPlugin {
  id: ChannelId;

  // Lifecycle
  start(): Promise<void>;
  stop(): Promise<void>;

  // Message handling
  onMessage(handler: MessageHandler): void;

  // Send message
  send(target: string, message: OutboundMessage): Promise<void>;

  // Capabilities
  capabilities: ChannelCapabilities;
}

export type MessageHandler = (ctx: MsgContext) => Promise<void>;

export interface MsgContext {
  // Sender
  from: string;
  senderName: string;
  senderUsername?: string;

  // Message
  body: string;
  messageId: string;
  replyToId?: string;

  // Channel
  channel: ChannelId;
  chatType: "direct" | "group" | "channel";
  groupId?: string;

  /** Set when the body came from pressing an inline button */
  fromButton?: boolean;

  // Metadata
  timestamp: number;
}

export interface OutboundMessage {
  text: string;
  replyToId?: string;
  buttons?: MessageButton[];
}

export interface MessageButton {
  text: string;
  callbackData: string;
}

export interface ChannelCapabilities {
  buttons: boolean;
  markdown: boolean;
  maxMessageLength: number;
}

/** "telegram:123" -> principal id */
export function principalIdOf(channel: ChannelId, userId: string): string {
  return `${channel}:${userId}`;
}

/** Split a principal id into channel and user id. Null when malformed. */
export function parsePrincipalId(principalId: string): { channel: string; userId: string } | null {
  const idx = principalId.indexOf(":");
  if (idx <= 0 || idx === principalId.length - 1) return null;
  return { channel: principalId.slice(0, idx), userId: principalId.slice(idx + 1) };
}
