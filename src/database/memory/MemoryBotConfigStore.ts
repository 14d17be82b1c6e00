import { BotConfig, DatabaseResult } from '../models';
import { BotConfigStore, SaveBotConfigData } from '../stores';

const keyOf = (botId: number, chatId: string): string => `${botId}:${chatId}`;

const cloneConfig = (config: BotConfig): BotConfig => ({
  ...config,
  auto_responses: config.auto_responses.map((entry) => ({ ...entry })),
  blocked_words: [...config.blocked_words],
  commands: { ...config.commands },
  created_at: new Date(config.created_at),
  updated_at: new Date(config.updated_at),
});

/**
 * In-process BotConfigStore. Hands out copies so callers cannot mutate
 * stored records behind the store's back.
 */
export class MemoryBotConfigStore implements BotConfigStore {
  private readonly configs = new Map<string, BotConfig>();

  async findByChat(
    botId: number,
    chatId: string,
  ): Promise<DatabaseResult<BotConfig>> {
    const config = this.configs.get(keyOf(botId, chatId));
    return { success: true, data: config ? cloneConfig(config) : undefined };
  }

  async findByBot(botId: number): Promise<DatabaseResult<BotConfig[]>> {
    const data = [...this.configs.values()]
      .filter((config) => config.bot_id === botId)
      .map(cloneConfig);
    return { success: true, data };
  }

  async create(data: SaveBotConfigData): Promise<DatabaseResult<BotConfig>> {
    const existing = this.configs.get(keyOf(data.bot_id, data.chat_id));
    if (existing) {
      return { success: true, data: cloneConfig(existing), affected_rows: 0 };
    }
    return this.save(data);
  }

  async save(data: SaveBotConfigData): Promise<DatabaseResult<BotConfig>> {
    const key = keyOf(data.bot_id, data.chat_id);
    const existing = this.configs.get(key);
    const now = new Date();

    const config: BotConfig = cloneConfig({
      ...data,
      created_at: existing?.created_at ?? now,
      updated_at: now,
    });
    this.configs.set(key, config);

    return { success: true, data: cloneConfig(config), affected_rows: 1 };
  }

  async delete(botId: number, chatId: string): Promise<DatabaseResult<boolean>> {
    const deleted = this.configs.delete(keyOf(botId, chatId));
    return { success: true, data: deleted, affected_rows: deleted ? 1 : 0 };
  }
}
