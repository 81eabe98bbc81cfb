export type ParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export interface MessageSender {
  /** Resolves once the transport accepted the message; rejects otherwise. */
  sendMessage(chatId: string, text: string, parseMode?: ParseMode): Promise<void>;
}

export interface BotIdentity {
  botName: string;
  botUsername: string | null;
  chatId: string;
  chatType: string;
  chatTitle: string;
}
