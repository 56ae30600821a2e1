import { Api } from 'grammy';
import type { Logger } from '../logger.js';

/** Outbound side of the chat transport. */
export interface ChatSender {
  sendMessage(chatId: string, text: string): Promise<void>;
}

export class TelegramSender implements ChatSender {
  private readonly api: Api;

  constructor(botToken: string) {
    this.api = new Api(botToken);
  }

  async sendMessage(chatId: string, text: string): Promise<void> {
    await this.api.sendMessage(chatId, text);
  }
}

/** Used when no bot token is configured: messages only reach the log. */
export class LogSender implements ChatSender {
  constructor(private readonly logger: Logger) {}

  async sendMessage(chatId: string, text: string): Promise<void> {
    this.logger.info({ chatId, text }, 'Outbound message (no bot token configured)');
  }
}
