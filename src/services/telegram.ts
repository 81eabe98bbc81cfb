import { Telegraf } from 'telegraf';
import { BotIdentity, MessageSender, ParseMode } from '../types/telegram';
import { logger } from '../utils/logger';

/**
 * Thin wrapper around the Telegraf client. One instance is built at startup and shared
 * by the notifier and the diagnostic routes; it never polls for updates.
 */
export class TelegramService implements MessageSender {
  private readonly bot: Telegraf;
  private readonly chatId: string;

  constructor(token: string, chatId: string) {
    this.bot = new Telegraf(token);
    this.chatId = chatId;
  }

  async sendMessage(chatId: string, text: string, parseMode?: ParseMode): Promise<void> {
    logger.debug(`Sending message to ${chatId}, parseMode: ${parseMode ?? 'none'}, text length: ${text.length}`);
    const extra: { parse_mode?: ParseMode } = parseMode ? { parse_mode: parseMode } : {};
    const result = await this.bot.telegram.sendMessage(chatId, text, extra);
    logger.debug('Message sent', { chatId, messageId: result.message_id });
  }

  async sendTestMessage(): Promise<void> {
    await this.sendMessage(this.chatId, 'Test message from new pair scout');
    logger.info('Test message sent successfully');
  }

  async getIdentity(): Promise<BotIdentity> {
    const [me, chat] = await Promise.all([
      this.bot.telegram.getMe(),
      this.bot.telegram.getChat(this.chatId)
    ]);

    return {
      botName: me.first_name,
      botUsername: me.username ?? null,
      chatId: this.chatId,
      chatType: chat.type,
      chatTitle: 'title' in chat && typeof chat.title === 'string' ? chat.title : 'N/A'
    };
  }
}
