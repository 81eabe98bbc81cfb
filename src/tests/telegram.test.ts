import { Telegram } from 'telegraf';
import { Message, UserFromGetMe } from 'telegraf/types';
import { TelegramService } from '../services/telegram';

type Chat = Awaited<ReturnType<Telegram['getChat']>>;

describe('TelegramService', () => {
  let service: TelegramService;

  beforeEach(() => {
    service = new TelegramService('test-token', '-100123');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('sendMessage', () => {
    it('should pass the parse mode through to the Bot API', async () => {
      const send = jest.spyOn(service['bot'].telegram, 'sendMessage')
        .mockResolvedValue({ message_id: 7 } as Message.TextMessage);

      await service.sendMessage('-100123', '*hi*', 'Markdown');

      expect(send).toHaveBeenCalledWith('-100123', '*hi*', { parse_mode: 'Markdown' });
    });

    it('should send plain text without extra options', async () => {
      const send = jest.spyOn(service['bot'].telegram, 'sendMessage')
        .mockResolvedValue({ message_id: 8 } as Message.TextMessage);

      await service.sendTestMessage();

      expect(send).toHaveBeenCalledWith('-100123', 'Test message from new pair scout', {});
    });

    it('should reject when the Bot API refuses the message', async () => {
      jest.spyOn(service['bot'].telegram, 'sendMessage')
        .mockRejectedValue(new Error('400: Bad Request: chat not found'));

      await expect(service.sendMessage('-1', 'hello')).rejects.toThrow('400: Bad Request: chat not found');
    });
  });

  describe('getIdentity', () => {
    it('should combine bot and chat details', async () => {
      jest.spyOn(service['bot'].telegram, 'getMe')
        .mockResolvedValue({ id: 1, is_bot: true, first_name: 'Scout', username: 'scout_bot' } as UserFromGetMe);
      const getChat = jest.spyOn(service['bot'].telegram, 'getChat')
        .mockResolvedValue({ id: -100123, type: 'supergroup', title: 'Alerts' } as Chat);

      expect(await service.getIdentity()).toEqual({
        botName: 'Scout',
        botUsername: 'scout_bot',
        chatId: '-100123',
        chatType: 'supergroup',
        chatTitle: 'Alerts'
      });
      expect(getChat).toHaveBeenCalledWith('-100123');
    });

    it('should fall back to N/A for chats without a title', async () => {
      jest.spyOn(service['bot'].telegram, 'getMe')
        .mockResolvedValue({ id: 1, is_bot: true, first_name: 'Scout', username: 'scout_bot' } as UserFromGetMe);
      jest.spyOn(service['bot'].telegram, 'getChat')
        .mockResolvedValue({ id: 42, type: 'private', first_name: 'Ada' } as Chat);

      const info = await service.getIdentity();

      expect(info.chatType).toBe('private');
      expect(info.chatTitle).toBe('N/A');
    });
  });
});
