/**
 * AdminCommandsPlugin - chat configuration commands for chat administrators
 */

import { toAppError } from '../middleware/errorHandler';
import { truncate } from '../utils/format';
import { thresholdNameSchema } from '../utils/validation';
import { BUILT_IN_COMMANDS, CommandSpec, isBuiltInCommand } from './commands';
import { CommandPlugin, ParsedCommand, PluginContext } from './types';

type AdminHandler = (args: string, context: PluginContext) => Promise<string>;

const usageOf = (name: string): string => {
  const spec: CommandSpec | undefined = BUILT_IN_COMMANDS.find(
    (command) => command.name === name,
  );
  return `Использование: ${spec?.usage ?? `/${name}`}`;
};

const splitFirstWord = (args: string): [string, string] => {
  const match = /^(\S+)\s*([\s\S]*)$/.exec(args);
  return match ? [match[1], match[2].trim()] : ['', ''];
};

export class AdminCommandsPlugin implements CommandPlugin {
  readonly kind = 'command';
  readonly name = 'admin-commands';

  private readonly handlers = new Map<string, AdminHandler>([
    ['addresponse', (args, context) => this.addResponse(args, context)],
    ['delresponse', (args, context) => this.deleteResponse(args, context)],
    ['block', (args, context) => this.block(args, context)],
    ['unblock', (args, context) => this.unblock(args, context)],
    ['addcommand', (args, context) => this.addCommand(args, context)],
    ['delcommand', (args, context) => this.deleteCommand(args, context)],
    ['set', (args, context) => this.setThreshold(args, context)],
    ['welcome', (args, context) => this.setWelcome(args, context)],
    ['stats', (_args, context) => this.stats(context)],
  ]);

  async onCommand(
    command: ParsedCommand,
    context: PluginContext,
  ): Promise<string | undefined> {
    const handler = this.handlers.get(command.name);
    if (!handler) {
      return undefined;
    }
    if (!context.message.is_admin) {
      return '⛔ Команда доступна только администраторам чата.';
    }

    try {
      return await handler(command.args, context);
    } catch (error) {
      // Validation and lookup failures are answered in the chat
      const appError = toAppError(error);
      if (appError.statusCode < 500) {
        return `❌ ${appError.message}`;
      }
      throw error;
    }
  }

  private async addResponse(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    const separator = args.indexOf('=');
    if (separator < 0) {
      return usageOf('addresponse');
    }
    const trigger = args.slice(0, separator).trim();
    const reply = args.slice(separator + 1).trim();

    await services.configs.setAutoResponse(
      message.bot_id,
      message.chat_id,
      trigger,
      reply,
    );
    return `✅ Автоответ на «${trigger}» сохранен.`;
  }

  private async deleteResponse(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    if (!args) {
      return usageOf('delresponse');
    }
    const removed = await services.configs.removeAutoResponse(
      message.bot_id,
      message.chat_id,
      args,
    );
    return removed
      ? `🗑 Автоответ на «${args}» удален.`
      : `Автоответ на «${args}» не найден.`;
  }

  private async block(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    if (!args) {
      return usageOf('block');
    }
    await services.configs.addBlockedWord(message.bot_id, message.chat_id, args);
    return `🚫 Слово «${args}» запрещено.`;
  }

  private async unblock(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    if (!args) {
      return usageOf('unblock');
    }
    const removed = await services.configs.removeBlockedWord(
      message.bot_id,
      message.chat_id,
      args,
    );
    return removed
      ? `✅ Слово «${args}» разрешено.`
      : `Слово «${args}» не было запрещено.`;
  }

  private async addCommand(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    const [rawName, description] = splitFirstWord(args);
    if (!rawName || !description) {
      return usageOf('addcommand');
    }
    const name = rawName.replace(/^\//, '').toLowerCase();
    if (isBuiltInCommand(name)) {
      return `❌ /${name} - встроенная команда.`;
    }

    await services.configs.setCommand(
      message.bot_id,
      message.chat_id,
      name,
      description,
    );
    return `✅ Команда /${name} сохранена.`;
  }

  private async deleteCommand(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    if (!args) {
      return usageOf('delcommand');
    }
    const name = args.replace(/^\//, '').toLowerCase();
    const removed = await services.configs.removeCommand(
      message.bot_id,
      message.chat_id,
      name,
    );
    return removed
      ? `🗑 Команда /${name} удалена.`
      : `Команда /${name} не найдена.`;
  }

  private async setThreshold(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    const [rawName, rawValue] = splitFirstWord(args);
    const name = thresholdNameSchema.safeParse(rawName);
    const value = Number(rawValue);
    if (!name.success || rawValue === '' || !Number.isFinite(value)) {
      return usageOf('set');
    }

    const config = await services.configs.setThreshold(
      message.bot_id,
      message.chat_id,
      name.data,
      value,
    );
    return `✅ ${name.data} = ${config[name.data]}`;
  }

  private async setWelcome(
    args: string,
    { message, services }: PluginContext,
  ): Promise<string> {
    const config = await services.configs.setWelcomeMessage(
      message.bot_id,
      message.chat_id,
      args,
    );
    return config.welcome_message
      ? `✅ Приветствие сохранено: ${truncate(config.welcome_message, 100)}`
      : '✅ Приветствие сброшено.';
  }

  private async stats({ message, services }: PluginContext): Promise<string> {
    const stats = await services.stats.getChatStats(
      message.bot_id,
      message.chat_id,
    );
    return [
      `📊 Статистика чата (${stats.period_days} дн.):`,
      `Всего сообщений: ${stats.total_messages}`,
      `Сообщений за период: ${stats.recent_messages}`,
      `Участников писало: ${stats.unique_users}`,
      `Мер модерации за период: ${stats.moderation_actions}`,
    ].join('\n');
  }
}
