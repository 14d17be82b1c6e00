/**
 * ConfigService - per-chat bot configuration store operations
 */

import {
  AutoResponse,
  BotConfig,
  BotConfigExport,
  BotConfigSettings,
  ChatInfo,
  defaultBotConfigSettings,
} from '../database/models';
import { BotConfigStore, SaveBotConfigData } from '../database/stores';
import { DatabaseError, NotFoundError } from '../middleware/errorHandler';
import { createLogger, Logger } from '../utils/logger';
import {
  blockedWordSchema,
  commandDescriptionSchema,
  commandNameSchema,
  muteDurationSchema,
  parseOrThrow,
  replySchema,
  ThresholdName,
  thresholdSchema,
  triggerSchema,
  updateBotConfigSchema,
} from '../utils/validation';
import { normalizeTrigger } from './ResponseResolver';

/**
 * Keeps the first position of every trigger; a later entry with the
 * same case-folded trigger replaces the earlier reply.
 */
export const mergeAutoResponses = (entries: AutoResponse[]): AutoResponse[] => {
  const merged: AutoResponse[] = [];
  for (const entry of entries) {
    const key = normalizeTrigger(entry.trigger);
    const index = merged.findIndex(
      (existing) => normalizeTrigger(existing.trigger) === key,
    );
    if (index >= 0) {
      merged[index] = { trigger: merged[index].trigger, reply: entry.reply };
    } else {
      merged.push({ trigger: entry.trigger.trim(), reply: entry.reply });
    }
  }
  return merged;
};

export const dedupeWords = (words: string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const word of words) {
    const trimmed = word.trim();
    const key = trimmed.toLowerCase();
    if (trimmed.length > 0 && !seen.has(key)) {
      seen.add(key);
      result.push(trimmed);
    }
  }
  return result;
};

const settingsOf = (config: BotConfig): BotConfigSettings => ({
  welcome_message: config.welcome_message,
  auto_responses: config.auto_responses,
  blocked_words: config.blocked_words,
  commands: config.commands,
  warn_threshold: config.warn_threshold,
  mute_duration: config.mute_duration,
  max_message_length: config.max_message_length,
});

export class ConfigService {
  private readonly logger: Logger;

  constructor(private readonly store: BotConfigStore) {
    this.logger = createLogger('ConfigService');
  }

  async findConfig(botId: number, chatId: string): Promise<BotConfig | null> {
    const result = await this.store.findByChat(botId, chatId);
    if (!result.success) {
      throw new DatabaseError(result.error);
    }
    return result.data ?? null;
  }

  async getConfig(botId: number, chatId: string): Promise<BotConfig> {
    const config = await this.findConfig(botId, chatId);
    if (!config) {
      throw new NotFoundError('Chat configuration');
    }
    return config;
  }

  async listConfigs(botId: number): Promise<BotConfig[]> {
    const result = await this.store.findByBot(botId);
    if (!result.success) {
      throw new DatabaseError(result.error);
    }
    return result.data ?? [];
  }

  /**
   * Returns the chat's configuration, creating one with default settings
   * the first time a chat is seen.
   */
  async ensureConfig(
    botId: number,
    chatId: string,
    info: ChatInfo = {},
  ): Promise<BotConfig> {
    const existing = await this.findConfig(botId, chatId);
    if (existing) {
      return existing;
    }

    this.logger.info('Creating chat configuration', {
      botId,
      chatId,
      chatType: info.chat_type,
    });

    // Insert-if-absent; an existing configuration is returned untouched
    const result = await this.store.create({
      bot_id: botId,
      chat_id: chatId,
      chat_name: info.chat_name,
      chat_type: info.chat_type,
      ...defaultBotConfigSettings,
    });
    if (!result.success || !result.data) {
      throw new DatabaseError(result.error);
    }
    return result.data;
  }

  /**
   * Applies a partial update, validated against updateBotConfigSchema
   */
  async updateConfig(
    botId: number,
    chatId: string,
    input: unknown,
  ): Promise<BotConfig> {
    const update = parseOrThrow(updateBotConfigSchema, input);
    const config = await this.getConfig(botId, chatId);

    this.logger.info('Updating chat configuration', {
      botId,
      chatId,
      fields: Object.keys(update),
    });

    return this.save({
      ...config,
      ...update,
      auto_responses: update.auto_responses
        ? mergeAutoResponses(update.auto_responses)
        : config.auto_responses,
      blocked_words: update.blocked_words
        ? dedupeWords(update.blocked_words)
        : config.blocked_words,
      welcome_message:
        update.welcome_message === undefined
          ? config.welcome_message
          : update.welcome_message || undefined,
    });
  }

  async setAutoResponse(
    botId: number,
    chatId: string,
    trigger: string,
    reply: string,
  ): Promise<BotConfig> {
    const entry = {
      trigger: parseOrThrow(triggerSchema, trigger),
      reply: parseOrThrow(replySchema, reply),
    };
    return this.mutate(botId, chatId, (config) => ({
      auto_responses: mergeAutoResponses([...config.auto_responses, entry]),
    }));
  }

  async removeAutoResponse(
    botId: number,
    chatId: string,
    trigger: string,
  ): Promise<boolean> {
    const key = normalizeTrigger(trigger);
    const config = await this.getConfig(botId, chatId);
    const remaining = config.auto_responses.filter(
      (entry) => normalizeTrigger(entry.trigger) !== key,
    );
    if (remaining.length === config.auto_responses.length) {
      return false;
    }
    await this.save({ ...config, auto_responses: remaining });
    return true;
  }

  async addBlockedWord(
    botId: number,
    chatId: string,
    word: string,
  ): Promise<BotConfig> {
    const blocked = parseOrThrow(blockedWordSchema, word);
    return this.mutate(botId, chatId, (config) => ({
      blocked_words: dedupeWords([...config.blocked_words, blocked]),
    }));
  }

  async removeBlockedWord(
    botId: number,
    chatId: string,
    word: string,
  ): Promise<boolean> {
    const key = word.trim().toLowerCase();
    const config = await this.getConfig(botId, chatId);
    const remaining = config.blocked_words.filter(
      (existing) => existing.toLowerCase() !== key,
    );
    if (remaining.length === config.blocked_words.length) {
      return false;
    }
    await this.save({ ...config, blocked_words: remaining });
    return true;
  }

  async setCommand(
    botId: number,
    chatId: string,
    name: string,
    description: string,
  ): Promise<BotConfig> {
    const commandName = parseOrThrow(commandNameSchema, name);
    const commandDescription = parseOrThrow(commandDescriptionSchema, description);
    return this.mutate(botId, chatId, (config) => ({
      commands: { ...config.commands, [commandName]: commandDescription },
    }));
  }

  async removeCommand(
    botId: number,
    chatId: string,
    name: string,
  ): Promise<boolean> {
    const config = await this.getConfig(botId, chatId);
    const commandName = name.trim().toLowerCase();
    if (!Object.prototype.hasOwnProperty.call(config.commands, commandName)) {
      return false;
    }
    const { [commandName]: _removed, ...commands } = config.commands;
    await this.save({ ...config, commands });
    return true;
  }

  async setThreshold(
    botId: number,
    chatId: string,
    name: ThresholdName,
    value: number,
  ): Promise<BotConfig> {
    const threshold = parseOrThrow(
      name === 'mute_duration' ? muteDurationSchema : thresholdSchema,
      value,
    );
    return this.mutate(botId, chatId, () => {
      const change: Partial<BotConfigSettings> = {};
      change[name] = threshold;
      return change;
    });
  }

  async setWelcomeMessage(
    botId: number,
    chatId: string,
    message: string,
  ): Promise<BotConfig> {
    const welcome = message.trim();
    return this.mutate(botId, chatId, () => ({
      welcome_message: welcome.length > 0 ? welcome : undefined,
    }));
  }

  /**
   * Restores default settings; chat identity and name are kept
   */
  async resetConfig(botId: number, chatId: string): Promise<BotConfig> {
    const config = await this.getConfig(botId, chatId);
    this.logger.info('Resetting chat configuration', { botId, chatId });
    return this.save({
      bot_id: config.bot_id,
      chat_id: config.chat_id,
      chat_name: config.chat_name,
      chat_type: config.chat_type,
      ...defaultBotConfigSettings,
    });
  }

  async exportConfig(botId: number, chatId: string): Promise<BotConfigExport> {
    const config = await this.getConfig(botId, chatId);
    return {
      chat_name: config.chat_name,
      chat_type: config.chat_type,
      ...settingsOf(config),
      exported_at: new Date().toISOString(),
    };
  }

  async deleteConfig(botId: number, chatId: string): Promise<void> {
    const result = await this.store.delete(botId, chatId);
    if (!result.success) {
      throw new DatabaseError(result.error);
    }
    if (!result.data) {
      throw new NotFoundError('Chat configuration');
    }
    this.logger.info('Chat configuration deleted', { botId, chatId });
  }

  private async mutate(
    botId: number,
    chatId: string,
    change: (config: BotConfig) => Partial<BotConfigSettings>,
  ): Promise<BotConfig> {
    const config = await this.getConfig(botId, chatId);
    return this.save({ ...config, ...change(config) });
  }

  private async save(data: SaveBotConfigData): Promise<BotConfig> {
    const result = await this.store.save(data);
    if (!result.success || !result.data) {
      throw new DatabaseError(result.error);
    }
    return result.data;
  }
}
