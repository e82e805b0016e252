import TelegramBot from "node-telegram-bot-api";
import { logger } from "../utils/logger.js";
import { Notifier } from "./collaborators.js";
import { PortfolioView, replyToCommand } from "./messages.js";

/** Alerts plus the /balance and /active commands; a blank token or chat id disables both. */
export class TelegramNotifier implements Notifier {
  private readonly bot: TelegramBot | null;
  private readonly chatId: string;

  constructor(botToken: string, chatId: string) {
    this.bot = botToken && chatId ? new TelegramBot(botToken, { polling: false }) : null;
    this.chatId = chatId;
  }

  async send(message: string): Promise<void> {
    if (!this.bot) {
      return;
    }
    await this.bot.sendMessage(this.chatId, message, { disable_web_page_preview: true });
  }

  listenForCommands(view: PortfolioView): void {
    const bot = this.bot;
    if (!bot) {
      return;
    }
    bot.on("message", (msg) => {
      if (String(msg.chat.id) !== this.chatId || !msg.text) {
        return;
      }
      const reply = replyToCommand(msg.text, view);
      if (reply) {
        this.send(reply).catch((err: unknown) => logger.warn({ err }, "Command reply failed"));
      }
    });
    bot.on("polling_error", (err) => logger.warn({ err }, "Telegram polling error"));
    bot.startPolling().catch((err: unknown) => logger.error({ err }, "Telegram polling failed to start"));
  }

  async stop(): Promise<void> {
    if (this.bot?.isPolling()) {
      await this.bot.stopPolling();
    }
  }
}
