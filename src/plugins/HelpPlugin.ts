/**
 * HelpPlugin - /start, /help, /settings and the chat's custom commands
 */

import { BotConfig } from '../database/models';
import { formatDuration } from '../utils/format';
import { BUILT_IN_COMMANDS } from './commands';
import { CommandPlugin, PluginContext } from './types';

export const DEFAULT_WELCOME =
  '👋 Привет! Я бот этого чата. Отправьте /help, чтобы увидеть список команд.';

const helpText = (config: BotConfig, isAdmin: boolean): string => {
  const lines = ['📋 Доступные команды:'];

  for (const command of BUILT_IN_COMMANDS) {
    if (!command.adminOnly) {
      lines.push(`${command.usage} - ${command.description}`);
    }
  }

  const custom = Object.entries(config.commands);
  if (custom.length > 0) {
    lines.push('', '🔧 Команды чата:');
    for (const [name, description] of custom) {
      lines.push(`/${name} - ${description}`);
    }
  }

  if (isAdmin) {
    lines.push('', '🛡 Команды администратора:');
    for (const command of BUILT_IN_COMMANDS) {
      if (command.adminOnly) {
        lines.push(`${command.usage} - ${command.description}`);
      }
    }
  }

  return lines.join('\n');
};

const settingsText = (config: BotConfig): string =>
  [
    '⚙️ Настройки чата:',
    `Предупреждений до ограничения: ${config.warn_threshold}`,
    `Длительность ограничения: ${
      config.mute_duration > 0 ? formatDuration(config.mute_duration) : 'выключено'
    }`,
    `Максимальная длина сообщения: ${config.max_message_length}`,
    `Автоответов: ${config.auto_responses.length}`,
    `Запрещенных слов: ${config.blocked_words.length}`,
    `Команд чата: ${Object.keys(config.commands).length}`,
    `Приветствие: ${config.welcome_message ? 'задано' : 'по умолчанию'}`,
  ].join('\n');

export const helpPlugin: CommandPlugin = {
  kind: 'command',
  name: 'help',
  onCommand: ({ name }, { config, message }: PluginContext) => {
    switch (name) {
      case 'start':
        return config.welcome_message ?? DEFAULT_WELCOME;
      case 'help':
        return helpText(config, message.is_admin);
      case 'settings':
        return settingsText(config);
      default:
        return Object.prototype.hasOwnProperty.call(config.commands, name)
          ? config.commands[name]
          : undefined;
    }
  },
};
