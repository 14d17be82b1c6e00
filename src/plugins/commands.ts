import { ParsedCommand } from './types';

export interface CommandSpec {
  name: string;
  usage: string;
  description: string;
  adminOnly: boolean;
}

export const BUILT_IN_COMMANDS: readonly CommandSpec[] = [
  { name: 'start', usage: '/start', description: 'Приветствие', adminOnly: false },
  { name: 'help', usage: '/help', description: 'Список команд', adminOnly: false },
  { name: 'settings', usage: '/settings', description: 'Настройки чата', adminOnly: false },
  {
    name: 'addresponse',
    usage: '/addresponse <триггер> = <ответ>',
    description: 'Добавить автоответ',
    adminOnly: true,
  },
  {
    name: 'delresponse',
    usage: '/delresponse <триггер>',
    description: 'Удалить автоответ',
    adminOnly: true,
  },
  { name: 'block', usage: '/block <слово>', description: 'Запретить слово', adminOnly: true },
  { name: 'unblock', usage: '/unblock <слово>', description: 'Разрешить слово', adminOnly: true },
  {
    name: 'addcommand',
    usage: '/addcommand <имя> <описание>',
    description: 'Добавить команду',
    adminOnly: true,
  },
  {
    name: 'delcommand',
    usage: '/delcommand <имя>',
    description: 'Удалить команду',
    adminOnly: true,
  },
  {
    name: 'set',
    usage: '/set <warn_threshold|mute_duration|max_message_length> <число>',
    description: 'Изменить порог модерации',
    adminOnly: true,
  },
  {
    name: 'welcome',
    usage: '/welcome <текст>',
    description: 'Приветственное сообщение (пустой текст удаляет его)',
    adminOnly: true,
  },
  { name: 'stats', usage: '/stats', description: 'Статистика чата за 7 дней', adminOnly: true },
];

export const isBuiltInCommand = (name: string): boolean =>
  BUILT_IN_COMMANDS.some((command) => command.name === name);

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/;

/**
 * Parses "/name@bot args" into a lowercase name and trimmed arguments.
 * Returns undefined when the text is not a command.
 */
export function parseCommand(text: string): ParsedCommand | undefined {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }
  return {
    name: match[1].toLowerCase(),
    args: (match[2] ?? '').trim(),
  };
}
