import { Bot } from "grammy";
import { createLogger } from "../../utils/logger.js";
import type {
  ChannelPlugin,
  MessageHandler,
  MsgContext,
  OutboundMessage,
  ChannelCapabilities,
} from "../interface.js";

const log = createLogger("telegram");

/**
 * Convert markdown to Telegram HTML
 * Telegram supports: <b>, <i>, <code>, <pre>, <a>
 */
export function markdownToTelegramHtml(text: string): string {
  let html = text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

  // Code blocks first, then inline code
  html = html.replace(/```(\w*)\n?([\s\S]*?)```/g, "<pre>$2</pre>");
  html = html.replace(/`([^`]+)`/g, "<code>$1</code>");

  html = html.replace(/\*\*([^*]+)\*\*/g, "<b>$1</b>");
  html = html.replace(/(?<!\*)\*([^*]+)\*(?!\*)/g, "<i>$1</i>");
  html = html.replace(/^- (.+)$/gm, "• $1");
  html = html.replace(/\n{3,}/g, "\n\n");

  return html.trim();
}

export interface TelegramConfig {
  token: string;
}

export function createTelegramPlugin(config: TelegramConfig): ChannelPlugin {
  const bot = new Bot(config.token);
  let messageHandler: MessageHandler | null = null;
  let handlersInstalled = false;

  const capabilities: ChannelCapabilities = {
    buttons: true,
    markdown: true,
    maxMessageLength: 4096,
  };

  async function dispatch(msgCtx: MsgContext): Promise<void> {
    if (!messageHandler) return;
    try {
      await messageHandler(msgCtx);
    } catch (err) {
      log.error("Error handling message", err);
    }
  }

  function installHandlers(): void {
    if (handlersInstalled) return;
    handlersInstalled = true;

    bot.on("message:text", async (ctx) => {
      const chatType = ctx.chat.type === "private" ? "direct" : "group";

      // Allow-list gating is done by the command router, which sees every message.
      await dispatch({
        from: ctx.from?.id.toString() ?? "",
        senderName: ctx.from?.first_name ?? "Unknown",
        senderUsername: ctx.from?.username,
        body: ctx.message.text.trim(),
        messageId: ctx.message.message_id.toString(),
        replyToId: ctx.message.reply_to_message?.message_id.toString(),
        channel: "telegram",
        chatType,
        groupId: chatType === "group" ? ctx.chat.id.toString() : undefined,
        timestamp: ctx.message.date * 1000,
      });
    });

    // Inline buttons carry a command ("/confirm <token>") as callback data
    bot.on("callback_query:data", async (ctx) => {
      try {
        await ctx.answerCallbackQuery();
      } catch (err) {
        log.warn("Failed to answer callback query", err);
      }

      const message = ctx.callbackQuery.message;
      await dispatch({
        from: ctx.from.id.toString(),
        senderName: ctx.from.first_name,
        senderUsername: ctx.from.username,
        body: ctx.callbackQuery.data.trim(),
        messageId: message ? message.message_id.toString() : ctx.callbackQuery.id,
        channel: "telegram",
        chatType: "direct",
        fromButton: true,
        timestamp: Date.now(),
      });
    });
  }

  return {
    id: "telegram",
    capabilities,

    async start() {
      log.info("Starting Telegram bot...");
      installHandlers();

      // bot.start() resolves only when polling stops
      bot.start().catch((err: unknown) => {
        log.error("Telegram polling stopped with error", err);
      });
      log.info("Telegram bot started");
    },

    async stop() {
      log.info("Stopping Telegram bot...");
      await bot.stop();
      log.info("Telegram bot stopped");
    },

    onMessage(handler: MessageHandler) {
      messageHandler = handler;
    },

    async send(target: string, message: OutboundMessage) {
      const chatId = parseInt(target, 10);

      if (!message.text || message.text.trim().length === 0) {
        log.warn("Skipping send: message text is empty");
        return;
      }

      const replyMarkup = message.buttons?.length
        ? {
            inline_keyboard: [
              message.buttons.map((b) => ({ text: b.text, callback_data: b.callbackData })),
            ],
          }
        : undefined;
      const replyParameters = message.replyToId
        ? { message_id: parseInt(message.replyToId, 10) }
        : undefined;

      try {
        await bot.api.sendMessage(chatId, markdownToTelegramHtml(message.text), {
          parse_mode: "HTML",
          reply_markup: replyMarkup,
          reply_parameters: replyParameters,
        });
      } catch (err) {
        // Fallback to plain text if HTML parsing fails
        log.warn("HTML parsing failed, sending as plain text", err);
        await bot.api.sendMessage(chatId, message.text, {
          reply_markup: replyMarkup,
          reply_parameters: replyParameters,
        });
      }
    },
  };
}
