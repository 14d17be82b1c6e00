/**
 * TelegramBotService tests (node-telegram-bot-api is auto-mocked in setup)
 */

import TelegramBot from 'node-telegram-bot-api';
import { detectMessageType, TelegramBotService } from '../../src/bot/TelegramBot';
import { AdminCommandsPlugin } from '../../src/plugins/AdminCommandsPlugin';
import { autoResponsePlugin } from '../../src/plugins/AutoResponsePlugin';
import { helpPlugin } from '../../src/plugins/HelpPlugin';
import { PluginRegistry } from '../../src/plugins/PluginRegistry';
import { MessagePipeline } from '../../src/services/MessagePipeline';
import { BOT_ID, CHAT_ID, createServices } from '../helpers/factories';

const GROUP_ID = Number(CHAT_ID);
const USER_ID = 42;

const buildTelegramMessage = (
  overrides: Partial<TelegramBot.Message> = {},
): TelegramBot.Message => ({
  message_id: 7,
  date: 1767225600,
  chat: { id: GROUP_ID, type: 'supergroup', title: 'Test chat' },
  from: { id: USER_ID, is_bot: false, first_name: 'Test', username: 'tester' },
  text: 'hello',
  ...overrides,
});

const member = (status: TelegramBot.ChatMemberStatus): TelegramBot.ChatMember => ({
  user: { id: USER_ID, is_bot: false, first_name: 'Test' },
  status,
});

describe('detectMessageType', () => {
  it('should prefer text', () => {
    expect(detectMessageType(buildTelegramMessage())).toBe('text');
  });

  it('should report animations before documents', () => {
    const msg = buildTelegramMessage({
      text: undefined,
      animation: { file_id: 'a', file_unique_id: 'a', width: 1, height: 1, duration: 1 },
      document: { file_id: 'd', file_unique_id: 'd' },
    });

    expect(detectMessageType(msg)).toBe('animation');
  });

  it('should fall back to other', () => {
    expect(detectMessageType(buildTelegramMessage({ text: undefined }))).toBe('other');
  });
});

describe('TelegramBotService', () => {
  let services: ReturnType<typeof createServices>;
  let service: TelegramBotService;
  let bot: TelegramBot;

  beforeEach(async () => {
    services = createServices();
    const plugins = new PluginRegistry()
      .register(new AdminCommandsPlugin())
      .register(helpPlugin)
      .register(autoResponsePlugin);
    const pipeline = new MessagePipeline({
      configs: services.configs,
      moderation: services.moderation,
      stats: services.stats,
      plugins,
    });

    service = new TelegramBotService(
      { token: 'test-token', botId: BOT_ID, adminUserIds: new Set([99]) },
      pipeline,
    );
    bot = service.getBotInstance();
    jest.mocked(bot.getChatMember).mockResolvedValue(member('member'));
    jest.mocked(bot.deleteMessage).mockResolvedValue(true);

    await services.configs.ensureConfig(BOT_ID, CHAT_ID);
  });

  describe('initialize', () => {
    it('should register handlers and become ready', async () => {
      jest.mocked(bot.getMe).mockResolvedValue({
        id: 1000,
        is_bot: true,
        first_name: 'Bot',
        username: 'test_bot',
      });
      jest.mocked(bot.setMyCommands).mockResolvedValue(true);

      await service.initialize();

      expect(service.isReady()).toBe(true);
      expect(bot.setWebHook).not.toHaveBeenCalled();
      expect(bot.on).toHaveBeenCalledWith('message', expect.any(Function));
    });

    it('should register the webhook with its secret token', async () => {
      const webhookService = new TelegramBotService(
        {
          token: 'test-token',
          botId: BOT_ID,
          webhookUrl: 'https://bot.example/telegram/webhook',
          webhookSecret: 'test-secret',
        },
        new MessagePipeline({
          configs: services.configs,
          moderation: services.moderation,
          stats: services.stats,
          plugins: new PluginRegistry(),
        }),
      );
      const webhookBot = webhookService.getBotInstance();
      jest.mocked(webhookBot.getMe).mockResolvedValue({
        id: 1000,
        is_bot: true,
        first_name: 'Bot',
        username: 'test_bot',
      });
      jest.mocked(webhookBot.setMyCommands).mockResolvedValue(true);
      jest.mocked(webhookBot.setWebHook).mockResolvedValue(true);

      await webhookService.initialize();

      expect(webhookBot.setWebHook).toHaveBeenCalledWith(
        'https://bot.example/telegram/webhook',
        { secret_token: 'test-secret' },
      );
    });

    it('should fail when the token is rejected', async () => {
      jest.mocked(bot.getMe).mockRejectedValue(new Error('401 Unauthorized'));

      await expect(service.initialize()).rejects.toThrow('401 Unauthorized');
      expect(service.isReady()).toBe(false);
    });
  });

  describe('handleIncoming', () => {
    it('should ignore messages from bots', async () => {
      const outcome = await service.handleIncoming(
        buildTelegramMessage({
          from: { id: 5, is_bot: true, first_name: 'Other bot' },
        }),
      );

      expect(outcome).toBeUndefined();
      expect(bot.sendMessage).not.toHaveBeenCalled();
    });

    it('should send auto-responses', async () => {
      await services.configs.setAutoResponse(BOT_ID, CHAT_ID, 'привет', 'Здравствуйте!');

      const outcome = await service.handleIncoming(buildTelegramMessage({ text: 'Привет' }));

      expect(outcome?.kind).toBe('reply');
      expect(bot.sendMessage).toHaveBeenCalledWith(GROUP_ID, 'Здравствуйте!');
    });

    it('should use photo captions as text', async () => {
      await services.configs.setAutoResponse(BOT_ID, CHAT_ID, 'привет', 'Здравствуйте!');

      await service.handleIncoming(
        buildTelegramMessage({
          text: undefined,
          caption: 'привет',
          photo: [{ file_id: 'p', file_unique_id: 'p', width: 1, height: 1 }],
        }),
      );

      expect(bot.sendMessage).toHaveBeenCalledWith(GROUP_ID, 'Здравствуйте!');
    });

    it('should delete a violating message and warn the sender', async () => {
      await services.configs.addBlockedWord(BOT_ID, CHAT_ID, 'казино');

      const outcome = await service.handleIncoming(
        buildTelegramMessage({ text: 'лучшее казино' }),
      );

      expect(bot.deleteMessage).toHaveBeenCalledWith(GROUP_ID, 7);
      expect(bot.restrictChatMember).not.toHaveBeenCalled();
      expect(bot.sendMessage).toHaveBeenCalledWith(
        GROUP_ID,
        '⚠️ @tester, предупреждение 1/3. Причина: Запрещенные слова: казино',
      );
      expect(outcome?.kind).toBe('moderation');
    });

    it('should mute a sender who reaches the warning threshold', async () => {
      await services.configs.addBlockedWord(BOT_ID, CHAT_ID, 'казино');
      await services.configs.setThreshold(BOT_ID, CHAT_ID, 'warn_threshold', 1);

      await service.handleIncoming(buildTelegramMessage({ text: 'казино' }));

      expect(bot.restrictChatMember).toHaveBeenCalledWith(
        GROUP_ID,
        USER_ID,
        expect.objectContaining({
          permissions: expect.objectContaining({ can_send_messages: false }),
          until_date: expect.any(Number),
        }),
      );
      expect(bot.sendMessage).toHaveBeenCalledWith(
        GROUP_ID,
        '🔇 @tester, вы ограничены на 5 мин. Причина: Запрещенные слова: казино',
      );
    });

    it('should not moderate chat administrators', async () => {
      await services.configs.addBlockedWord(BOT_ID, CHAT_ID, 'казино');
      jest.mocked(bot.getChatMember).mockResolvedValue(member('administrator'));

      const outcome = await service.handleIncoming(buildTelegramMessage({ text: 'казино' }));

      expect(outcome).toEqual({ kind: 'silent' });
      expect(bot.getChatMember).toHaveBeenCalledWith(GROUP_ID, USER_ID);
      expect(bot.deleteMessage).not.toHaveBeenCalled();
    });

    it('should treat configured admin ids as administrators', async () => {
      await services.configs.addBlockedWord(BOT_ID, CHAT_ID, 'казино');

      const outcome = await service.handleIncoming(
        buildTelegramMessage({
          text: 'казино',
          from: { id: 99, is_bot: false, first_name: 'Owner' },
        }),
      );

      expect(outcome).toEqual({ kind: 'silent' });
      expect(bot.getChatMember).not.toHaveBeenCalled();
    });

    it('should treat a failed member lookup as a regular member', async () => {
      await services.configs.addBlockedWord(BOT_ID, CHAT_ID, 'казино');
      jest.mocked(bot.getChatMember).mockRejectedValue(new Error('Bad Request'));

      const outcome = await service.handleIncoming(buildTelegramMessage({ text: 'казино' }));

      expect(outcome?.kind).toBe('moderation');
    });

    it('should still notify when deleting the message fails', async () => {
      await services.configs.addBlockedWord(BOT_ID, CHAT_ID, 'казино');
      jest.mocked(bot.deleteMessage).mockRejectedValue(new Error('message not found'));

      await expect(
        service.handleIncoming(buildTelegramMessage({ text: 'казино' })),
      ).resolves.toEqual(expect.objectContaining({ kind: 'moderation' }));
      expect(bot.sendMessage).toHaveBeenCalledTimes(1);
    });

    it('should greet new members with the welcome message', async () => {
      await services.configs.setWelcomeMessage(BOT_ID, CHAT_ID, 'Добро пожаловать!');

      const outcome = await service.handleIncoming(
        buildTelegramMessage({
          text: undefined,
          new_chat_members: [{ id: 55, is_bot: false, first_name: 'Newcomer' }],
        }),
      );

      expect(outcome).toEqual({ kind: 'reply', text: 'Добро пожаловать!', source: 'welcome' });
      expect(bot.sendMessage).toHaveBeenCalledWith(GROUP_ID, 'Добро пожаловать!');
    });

    it('should record messages under the string chat id', async () => {
      await service.handleIncoming(buildTelegramMessage({ text: 'unmatched' }));

      const stats = await services.stats.getChatStats(BOT_ID, CHAT_ID);
      expect(stats.total_messages).toBe(1);
    });
  });
});
