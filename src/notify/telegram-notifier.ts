import type { BotConfig } from "../types/index.js";
import type { Logger } from "../utils/logger.js";

export interface Notifier {
  /** Best-effort delivery; never rejects */
  send(text: string): Promise<void>;
}

export class TelegramNotifier implements Notifier {
  private botToken: string;
  private chatId: string;
  private logger: Logger;

  constructor(config: BotConfig, logger: Logger) {
    this.botToken = config.telegram.botToken;
    this.chatId = config.telegram.chatId;
    this.logger = logger;
  }

  get enabled(): boolean {
    return this.botToken !== "" && this.chatId !== "";
  }

  async send(text: string): Promise<void> {
    if (!this.enabled) {
      this.logger.debug("Telegram not configured, skipping notification");
      return;
    }

    try {
      const response = await fetch(`https://api.telegram.org/bot${this.botToken}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: "HTML" }),
        signal: AbortSignal.timeout(10_000),
      });
      if (!response.ok) {
        this.logger.warn(`Telegram notification failed: HTTP ${response.status}`);
      }
    } catch (err) {
      this.logger.warn(`Telegram notification failed: ${err}`);
    }
  }
}
