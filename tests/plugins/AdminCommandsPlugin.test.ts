/**
 * AdminCommandsPlugin unit tests
 */

import { AdminCommandsPlugin } from '../../src/plugins/AdminCommandsPlugin';
import { parseCommand } from '../../src/plugins/commands';
import { BOT_ID, CHAT_ID, buildContext, createServices } from '../helpers/factories';

describe('AdminCommandsPlugin', () => {
  const plugin = new AdminCommandsPlugin();
  let services: ReturnType<typeof createServices>;

  const run = async (text: string, isAdmin = true) => {
    const command = parseCommand(text);
    if (!command) {
      throw new Error(`Not a command: ${text}`);
    }
    const config = await services.configs.ensureConfig(BOT_ID, CHAT_ID);
    return plugin.onCommand(command, buildContext(services, config, { is_admin: isAdmin }));
  };

  beforeEach(() => {
    services = createServices();
  });

  it('should ignore commands it does not own', async () => {
    await expect(run('/help')).resolves.toBeUndefined();
  });

  it('should refuse non-administrators', async () => {
    await expect(run('/block spam', false)).resolves.toBe(
      '⛔ Команда доступна только администраторам чата.',
    );
    const config = await services.configs.getConfig(BOT_ID, CHAT_ID);
    expect(config.blocked_words).toEqual([]);
  });

  describe('/addresponse and /delresponse', () => {
    it('should add an auto-response', async () => {
      await expect(run('/addresponse Привет = Здравствуйте!')).resolves.toBe(
        '✅ Автоответ на «Привет» сохранен.',
      );
      const config = await services.configs.getConfig(BOT_ID, CHAT_ID);
      expect(config.auto_responses).toEqual([{ trigger: 'Привет', reply: 'Здравствуйте!' }]);
    });

    it('should print usage without a separator', async () => {
      await expect(run('/addresponse привет')).resolves.toBe(
        'Использование: /addresponse <триггер> = <ответ>',
      );
    });

    it('should report validation errors in the chat', async () => {
      await expect(run('/addresponse привет =')).resolves.toBe('❌ Reply cannot be empty');
    });

    it('should delete an auto-response', async () => {
      await run('/addresponse привет = hi');

      await expect(run('/delresponse привет')).resolves.toBe('🗑 Автоответ на «привет» удален.');
      await expect(run('/delresponse привет')).resolves.toBe('Автоответ на «привет» не найден.');
    });
  });

  describe('/block and /unblock', () => {
    it('should block and unblock a word', async () => {
      await expect(run('/block казино')).resolves.toBe('🚫 Слово «казино» запрещено.');
      await expect(run('/unblock казино')).resolves.toBe('✅ Слово «казино» разрешено.');
      await expect(run('/unblock казино')).resolves.toBe('Слово «казино» не было запрещено.');
    });

    it('should print usage without a word', async () => {
      await expect(run('/block')).resolves.toBe('Использование: /block <слово>');
    });
  });

  describe('/addcommand and /delcommand', () => {
    it('should add a custom command', async () => {
      await expect(run('/addcommand /Rules Правила чата')).resolves.toBe(
        '✅ Команда /rules сохранена.',
      );
      const config = await services.configs.getConfig(BOT_ID, CHAT_ID);
      expect(config.commands).toEqual({ rules: 'Правила чата' });
    });

    it('should refuse to shadow a built-in command', async () => {
      await expect(run('/addcommand help Моя справка')).resolves.toBe(
        '❌ /help - встроенная команда.',
      );
    });

    it('should require a description', async () => {
      await expect(run('/addcommand rules')).resolves.toBe(
        'Использование: /addcommand <имя> <описание>',
      );
    });

    it('should delete a custom command', async () => {
      await run('/addcommand rules Правила');

      await expect(run('/delcommand rules')).resolves.toBe('🗑 Команда /rules удалена.');
      await expect(run('/delcommand rules')).resolves.toBe('Команда /rules не найдена.');
    });
  });

  describe('/set', () => {
    it('should change a threshold', async () => {
      await expect(run('/set mute_duration 600')).resolves.toBe('✅ mute_duration = 600');
    });

    it('should print usage for an unknown setting', async () => {
      await expect(run('/set colour 5')).resolves.toBe(
        'Использование: /set <warn_threshold|mute_duration|max_message_length> <число>',
      );
    });

    it('should print usage for a non-numeric value', async () => {
      await expect(run('/set warn_threshold many')).resolves.toBe(
        'Использование: /set <warn_threshold|mute_duration|max_message_length> <число>',
      );
    });

    it('should report negative values', async () => {
      await expect(run('/set warn_threshold -1')).resolves.toBe(
        '❌ Number must be greater than or equal to 0',
      );
    });
  });

  describe('/welcome', () => {
    it('should set and clear the welcome message', async () => {
      await expect(run('/welcome Добро пожаловать!')).resolves.toBe(
        '✅ Приветствие сохранено: Добро пожаловать!',
      );
      await expect(run('/welcome')).resolves.toBe('✅ Приветствие сброшено.');
    });
  });

  describe('/stats', () => {
    it('should report chat statistics', async () => {
      await services.stats.recordMessage({
        bot_id: BOT_ID,
        chat_id: CHAT_ID,
        user_id: '1',
        message_type: 'text',
      });

      await expect(run('/stats')).resolves.toBe(
        [
          '📊 Статистика чата (7 дн.):',
          'Всего сообщений: 1',
          'Сообщений за период: 1',
          'Участников писало: 1',
          'Мер модерации за период: 0',
        ].join('\n'),
      );
    });
  });
});
