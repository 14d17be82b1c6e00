/**
 * MessagePipeline - platform-independent handling of one incoming message.
 *
 * The adapter hands in a ChatMessage and executes the returned outcome;
 * nothing here talks to a chat platform.
 */

import { isViolation, ModerationDecision } from '../database/models';
import { parseCommand } from '../plugins/commands';
import { PluginRegistry } from '../plugins/PluginRegistry';
import { ChatMessage, PluginContext, PluginServices } from '../plugins/types';
import { createLogger, Logger } from '../utils/logger';
import { ConfigService } from './ConfigService';
import {
  AdvertisementPredicate,
  classify,
  neverAdvertisement,
} from './MessageClassifier';
import { ModerationPlan, ModerationService } from './ModerationService';
import { StatsService } from './StatsService';

export type PipelineOutcome =
  | { kind: 'silent' }
  | { kind: 'reply'; text: string; source: string }
  | {
      kind: 'moderation';
      decision: ModerationDecision;
      plan: ModerationPlan;
    };

export interface MessagePipelineDeps {
  configs: ConfigService;
  moderation: ModerationService;
  stats: StatsService;
  plugins: PluginRegistry;
  isAdvertisement?: AdvertisementPredicate;
}

export class MessagePipeline {
  private readonly logger: Logger;
  private readonly isAdvertisement: AdvertisementPredicate;
  private readonly services: PluginServices;

  constructor(private readonly deps: MessagePipelineDeps) {
    this.logger = createLogger('MessagePipeline');
    this.isAdvertisement = deps.isAdvertisement ?? neverAdvertisement;
    this.services = { configs: deps.configs, stats: deps.stats };
  }

  async handleMessage(message: ChatMessage): Promise<PipelineOutcome> {
    const config = await this.deps.configs.ensureConfig(
      message.bot_id,
      message.chat_id,
      { chat_name: message.chat_name, chat_type: message.chat_type },
    );

    const rawText = message.text ?? '';
    const text = rawText.trim();
    const command = text ? parseCommand(text) : undefined;

    await this.deps.stats.recordMessage({
      bot_id: message.bot_id,
      chat_id: message.chat_id,
      user_id: message.user_id,
      message_type: command ? 'command' : message.message_type,
    });

    // Administrators are never moderated
    if (text && !message.is_admin) {
      const decision = classify(rawText, config, {
        isAdvertisement: this.isAdvertisement,
      });
      if (isViolation(decision)) {
        const plan = await this.deps.moderation.plan(
          decision,
          config,
          {
            bot_id: message.bot_id,
            chat_id: message.chat_id,
            user_id: message.user_id,
          },
          { userName: message.user_name },
        );
        return { kind: 'moderation', decision, plan };
      }
    }

    if (!text) {
      return { kind: 'silent' };
    }

    const context: PluginContext = {
      message,
      config,
      services: this.services,
    };

    const reply = command
      ? await this.deps.plugins.dispatchCommand(command, context)
      : await this.deps.plugins.dispatchMessage(context);

    if (!reply) {
      return { kind: 'silent' };
    }

    this.logger.debug('Replying', {
      botId: message.bot_id,
      chatId: message.chat_id,
      source: reply.source,
    });
    return { kind: 'reply', text: reply.text, source: reply.source };
  }

  /**
   * Greeting for members joining a chat; silent unless the chat has a
   * welcome message configured.
   */
  async handleNewMembers(
    message: Pick<ChatMessage, 'bot_id' | 'chat_id' | 'chat_name' | 'chat_type'>,
  ): Promise<PipelineOutcome> {
    const config = await this.deps.configs.ensureConfig(
      message.bot_id,
      message.chat_id,
      { chat_name: message.chat_name, chat_type: message.chat_type },
    );
    return config.welcome_message
      ? { kind: 'reply', text: config.welcome_message, source: 'welcome' }
      : { kind: 'silent' };
  }
}
