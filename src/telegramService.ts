import TelegramBot from "node-telegram-bot-api";
import { errorMessage } from "./errors";
import { formatTelegramMessage, MessageContext } from "./formatter";
import { logger } from "./logger";
import { Outage, TelegramSettings } from "./types";

export class TelegramService {
  private readonly bot: TelegramBot;
  private readonly chatId: string;

  constructor(settings: TelegramSettings) {
    if (!settings.botToken || !settings.chatId) {
      throw new Error("TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required");
    }
    this.chatId = settings.chatId;
    this.bot = new TelegramBot(settings.botToken, { polling: false });
    logger.info("TelegramService initialized");
  }

  /**
   * Sends the listing to the configured chat. Returns false instead of
   * throwing so a failed notification never aborts a watch cycle.
   */
  async sendOutages(outages: Outage[], context: MessageContext): Promise<boolean> {
    try {
      const message = formatTelegramMessage(outages, context);

      await this.bot.sendMessage(this.chatId, message, {
        parse_mode: "HTML",
        disable_web_page_preview: true,
      });

      logger.info(
        `Sent ${outages.length} outage(s) to Telegram chat ${this.chatId}`
      );
      return true;
    } catch (error) {
      logger.error(
        `Failed to send message to Telegram: ${errorMessage(error)}`,
        error
      );
      return false;
    }
  }
}
