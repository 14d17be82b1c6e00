/**
 * BotConfigDAO - Data Access Object for per-chat bot configurations
 */

import { db } from '../connection';
import {
  AutoResponse,
  BotConfig,
  ChatType,
  DatabaseResult,
} from '../models';
import { BotConfigStore, SaveBotConfigData } from '../stores';
import { createLogger, Logger } from '../../utils/logger';

export type BotConfigRow = {
  bot_id: number;
  chat_id: string;
  chat_name: string | null;
  chat_type: string | null;
  welcome_message: string | null;
  auto_responses: unknown;
  blocked_words: unknown;
  commands: unknown;
  warn_threshold: number;
  mute_duration: number;
  max_message_length: number;
  created_at: Date;
  updated_at: Date;
};

const CHAT_TYPES: readonly ChatType[] = [
  'private',
  'group',
  'supergroup',
  'channel',
];

// JSONB columns arrive parsed from pg, text columns as strings
const parseJson = (value: unknown): unknown =>
  typeof value === 'string' ? JSON.parse(value) : value;

const parseAutoResponses = (value: unknown): AutoResponse[] => {
  const parsed = parseJson(value);
  if (!Array.isArray(parsed)) return [];
  return parsed.flatMap((item: unknown) => {
    if (
      typeof item === 'object' &&
      item !== null &&
      'trigger' in item &&
      'reply' in item &&
      typeof item.trigger === 'string' &&
      typeof item.reply === 'string'
    ) {
      return [{ trigger: item.trigger, reply: item.reply }];
    }
    return [];
  });
};

const parseStringList = (value: unknown): string[] => {
  const parsed = parseJson(value);
  return Array.isArray(parsed)
    ? parsed.filter((item): item is string => typeof item === 'string')
    : [];
};

const parseCommands = (value: unknown): Record<string, string> => {
  const parsed = parseJson(value);
  const commands: Record<string, string> = {};
  if (typeof parsed === 'object' && parsed !== null) {
    for (const [name, description] of Object.entries(parsed)) {
      if (typeof description === 'string') {
        commands[name] = description;
      }
    }
  }
  return commands;
};

const parseChatType = (value: string | null): ChatType | undefined =>
  CHAT_TYPES.find((type) => type === value);

const INSERT_CONFIG = `
  INSERT INTO bot_configs (
    bot_id,
    chat_id,
    chat_name,
    chat_type,
    welcome_message,
    auto_responses,
    blocked_words,
    commands,
    warn_threshold,
    mute_duration,
    max_message_length
  )
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
`;

const configValues = (data: SaveBotConfigData): unknown[] => [
  data.bot_id,
  data.chat_id,
  data.chat_name ?? null,
  data.chat_type ?? null,
  data.welcome_message ?? null,
  JSON.stringify(data.auto_responses),
  JSON.stringify(data.blocked_words),
  JSON.stringify(data.commands),
  data.warn_threshold,
  data.mute_duration,
  data.max_message_length,
];

export class BotConfigDAO implements BotConfigStore {
  private logger: Logger;

  constructor() {
    this.logger = createLogger('BotConfigDAO');
  }

  parseRow(row: BotConfigRow): BotConfig {
    return {
      bot_id: Number(row.bot_id),
      chat_id: String(row.chat_id),
      chat_name: row.chat_name ?? undefined,
      chat_type: parseChatType(row.chat_type),
      welcome_message: row.welcome_message ?? undefined,
      auto_responses: parseAutoResponses(row.auto_responses),
      blocked_words: parseStringList(row.blocked_words),
      commands: parseCommands(row.commands),
      warn_threshold: Number(row.warn_threshold),
      mute_duration: Number(row.mute_duration),
      max_message_length: Number(row.max_message_length),
      created_at: new Date(row.created_at),
      updated_at: new Date(row.updated_at),
    };
  }

  /**
   * Получает конфигурацию чата
   */
  async findByChat(
    botId: number,
    chatId: string,
  ): Promise<DatabaseResult<BotConfig>> {
    try {
      const result = await db.query<BotConfigRow>(
        'SELECT * FROM bot_configs WHERE bot_id = $1 AND chat_id = $2',
        [botId, chatId],
      );

      const row = result.rows[0];
      return { success: true, data: row ? this.parseRow(row) : undefined };
    } catch (error) {
      this.logger.error('Failed to load bot config', { botId, chatId, error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Получает все чаты бота
   */
  async findByBot(botId: number): Promise<DatabaseResult<BotConfig[]>> {
    try {
      const result = await db.query<BotConfigRow>(
        'SELECT * FROM bot_configs WHERE bot_id = $1 ORDER BY created_at ASC',
        [botId],
      );
      return {
        success: true,
        data: result.rows.map((row) => this.parseRow(row)),
      };
    } catch (error) {
      this.logger.error('Failed to list bot configs', { botId, error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
        data: [],
      };
    }
  }

  /**
   * Создает конфигурацию, если ее еще нет; существующую не трогает
   */
  async create(data: SaveBotConfigData): Promise<DatabaseResult<BotConfig>> {
    try {
      const inserted = await db.query<BotConfigRow>(
        `${INSERT_CONFIG} ON CONFLICT (bot_id, chat_id) DO NOTHING RETURNING *`,
        configValues(data),
      );
      const row =
        inserted.rows[0] ??
        (
          await db.query<BotConfigRow>(
            'SELECT * FROM bot_configs WHERE bot_id = $1 AND chat_id = $2',
            [data.bot_id, data.chat_id],
          )
        ).rows[0];

      if (!row) {
        return { success: false, error: 'Bot config was not stored' };
      }

      return {
        success: true,
        data: this.parseRow(row),
        affected_rows: inserted.rowCount || 0,
      };
    } catch (error) {
      this.logger.error('Failed to create bot config', {
        botId: data.bot_id,
        chatId: data.chat_id,
        error,
      });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Создает или полностью перезаписывает конфигурацию чата
   */
  async save(data: SaveBotConfigData): Promise<DatabaseResult<BotConfig>> {
    try {
      const query = `${INSERT_CONFIG}
        ON CONFLICT (bot_id, chat_id) DO UPDATE SET
          chat_name = EXCLUDED.chat_name,
          chat_type = EXCLUDED.chat_type,
          welcome_message = EXCLUDED.welcome_message,
          auto_responses = EXCLUDED.auto_responses,
          blocked_words = EXCLUDED.blocked_words,
          commands = EXCLUDED.commands,
          warn_threshold = EXCLUDED.warn_threshold,
          mute_duration = EXCLUDED.mute_duration,
          max_message_length = EXCLUDED.max_message_length,
          updated_at = NOW()
        RETURNING *
      `;

      const result = await db.query<BotConfigRow>(query, configValues(data));

      this.logger.debug('Bot config saved', {
        botId: data.bot_id,
        chatId: data.chat_id,
      });

      return {
        success: true,
        data: this.parseRow(result.rows[0]),
        affected_rows: result.rowCount || 0,
      };
    } catch (error) {
      this.logger.error('Failed to save bot config', {
        botId: data.bot_id,
        chatId: data.chat_id,
        error,
      });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Удаляет конфигурацию чата
   */
  async delete(botId: number, chatId: string): Promise<DatabaseResult<boolean>> {
    try {
      const result = await db.query(
        'DELETE FROM bot_configs WHERE bot_id = $1 AND chat_id = $2',
        [botId, chatId],
      );

      const deleted = (result.rowCount ?? 0) > 0;
      return { success: true, data: deleted, affected_rows: result.rowCount || 0 };
    } catch (error) {
      this.logger.error('Failed to delete bot config', {
        botId,
        chatId,
        error,
      });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}

export const botConfigDAO = new BotConfigDAO();
