/**
 * Storage contracts shared by the PostgreSQL DAOs and the in-memory drivers
 */

import fs from 'fs/promises';
import path from 'path';
import {
  BotConfig,
  ChatInfo,
  BotConfigSettings,
  CreateMessageRecordData,
  ConfigTemplate,
  CreateConfigTemplateData,
  CreateModerationActionData,
  DatabaseResult,
  MessageCounts,
  MessageRecord,
  ModerationAction,
  TemplateFilter,
  UserKey,
} from './models';
import { db } from './connection';
import { botConfigDAO } from './dao/BotConfigDAO';
import { messageRecordDAO } from './dao/MessageRecordDAO';
import { moderationDAO } from './dao/ModerationDAO';
import { templateDAO } from './dao/TemplateDAO';
import { MemoryBotConfigStore } from './memory/MemoryBotConfigStore';
import { MemoryMessageLogStore } from './memory/MemoryMessageLogStore';
import { MemoryModerationStore } from './memory/MemoryModerationStore';
import { MemoryTemplateStore } from './memory/MemoryTemplateStore';
import { loadTemplates } from './templates';
import { createLogger } from '../utils/logger';

export interface SaveBotConfigData extends BotConfigSettings, ChatInfo {
  bot_id: number;
  chat_id: string;
}

/**
 * A missing record is a successful read without data; `success: false`
 * always means the storage itself failed.
 */
export interface BotConfigStore {
  findByChat(botId: number, chatId: string): Promise<DatabaseResult<BotConfig>>;
  findByBot(botId: number): Promise<DatabaseResult<BotConfig[]>>;
  /** Inserts only when the chat has no configuration; returns the stored one */
  create(data: SaveBotConfigData): Promise<DatabaseResult<BotConfig>>;
  save(data: SaveBotConfigData): Promise<DatabaseResult<BotConfig>>;
  /** data is false when there was nothing to delete */
  delete(botId: number, chatId: string): Promise<DatabaseResult<boolean>>;
}

export interface MessageLogStore {
  append(data: CreateMessageRecordData): Promise<DatabaseResult<MessageRecord>>;
  countMessages(
    botId: number,
    chatId: string,
    since: Date,
  ): Promise<DatabaseResult<MessageCounts>>;
}

export interface ModerationStore {
  recordAction(
    data: CreateModerationActionData,
  ): Promise<DatabaseResult<ModerationAction>>;
  countActions(
    botId: number,
    chatId: string,
    since: Date,
  ): Promise<DatabaseResult<number>>;
  getWarnings(key: UserKey): Promise<DatabaseResult<number>>;
  /**
   * Atomically adds one warning and returns the new count. When resetAt
   * is given and the count reaches it, the counter is cleared in the
   * same step.
   */
  addWarning(key: UserKey, resetAt?: number): Promise<DatabaseResult<number>>;
  purgeWarnings(updatedBefore: Date): Promise<DatabaseResult<number>>;
}

export interface TemplateStore {
  list(filter?: TemplateFilter): Promise<DatabaseResult<ConfigTemplate[]>>;
  findById(templateId: number): Promise<DatabaseResult<ConfigTemplate>>;
  /** Adds templates whose ids are not stored yet; returns how many */
  seed(templates: CreateConfigTemplateData[]): Promise<DatabaseResult<number>>;
}

export interface Stores {
  configs: BotConfigStore;
  messages: MessageLogStore;
  moderation: ModerationStore;
  templates: TemplateStore;
}

export type StorageDriver = 'memory' | 'postgres';

const logger = createLogger('Stores');

/**
 * Connects the chosen driver and returns its stores. The PostgreSQL
 * driver applies database/schema.sql on every start; the statements
 * are idempotent. Both drivers are seeded with database/templates.json.
 */
export async function createStores(driver: StorageDriver): Promise<Stores> {
  const templates = await loadTemplates();

  if (driver === 'memory') {
    logger.warn('Using in-memory storage; data is lost on restart');
    return {
      configs: new MemoryBotConfigStore(),
      messages: new MemoryMessageLogStore(),
      moderation: new MemoryModerationStore(),
      templates: new MemoryTemplateStore(templates),
    };
  }

  await db.connect();
  const schemaPath = path.resolve(__dirname, '../../database/schema.sql');
  const schema = await fs.readFile(schemaPath, 'utf8');
  await db.query(schema);
  logger.info('Database schema applied', { schemaPath });

  const seeded = await templateDAO.seed(templates);
  if (!seeded.success) {
    throw new Error(`Failed to seed templates: ${seeded.error}`);
  }
  logger.info('Templates seeded', { added: seeded.data });

  return {
    configs: botConfigDAO,
    messages: messageRecordDAO,
    moderation: moderationDAO,
    templates: templateDAO,
  };
}
