/**
 * TemplateService - browsing configuration templates and applying them to chats
 */

import { BotConfig, ConfigTemplate } from '../database/models';
import { TemplateStore } from '../database/stores';
import {
  DatabaseError,
  NotFoundError,
  ValidationError,
} from '../middleware/errorHandler';
import { createLogger, Logger } from '../utils/logger';
import { UpdateBotConfigInput } from '../utils/validation';
import { ConfigService } from './ConfigService';

/** Platform of the bots this service runs */
export const BOT_PLATFORM = 'telegram';

export class TemplateService {
  private readonly logger: Logger;

  constructor(
    private readonly store: TemplateStore,
    private readonly configs: ConfigService,
    private readonly platform: string = BOT_PLATFORM,
  ) {
    this.logger = createLogger('TemplateService');
  }

  /**
   * Public templates, optionally for one platform
   */
  async listTemplates(platform?: string): Promise<ConfigTemplate[]> {
    const result = await this.store.list({ platform, publicOnly: true });
    if (!result.success) {
      throw new DatabaseError(result.error);
    }
    return result.data ?? [];
  }

  async getTemplate(templateId: number): Promise<ConfigTemplate> {
    const result = await this.store.findById(templateId);
    if (!result.success) {
      throw new DatabaseError(result.error);
    }
    if (!result.data) {
      throw new NotFoundError('Template');
    }
    return result.data;
  }

  /**
   * Copies the template's welcome message, auto-responses and blocked
   * words into the chat's configuration, creating it when needed. Parts
   * the template leaves empty keep the chat's current values.
   */
  async applyTemplate(
    botId: number,
    chatId: string,
    templateId: number,
  ): Promise<BotConfig> {
    const template = await this.getTemplate(templateId);
    if (template.platform !== this.platform) {
      throw new ValidationError(
        `Template is for ${template.platform}, not ${this.platform}`,
      );
    }

    await this.configs.ensureConfig(botId, chatId);

    const { welcome_message, auto_responses, blocked_words } = template.settings;
    const update: UpdateBotConfigInput = {};
    if (welcome_message) {
      update.welcome_message = welcome_message;
    }
    if (auto_responses && auto_responses.length > 0) {
      update.auto_responses = auto_responses;
    }
    if (blocked_words && blocked_words.length > 0) {
      update.blocked_words = blocked_words;
    }

    const config = await this.configs.updateConfig(botId, chatId, update);
    this.logger.info('Template applied', {
      botId,
      chatId,
      templateId,
      fields: Object.keys(update),
    });
    return config;
  }
}
