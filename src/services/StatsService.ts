/**
 * StatsService - message log writes and per-chat statistics
 */

import {
  ChatStats,
  CreateMessageRecordData,
  MessageRecord,
} from '../database/models';
import { MessageLogStore, ModerationStore } from '../database/stores';
import { DatabaseError } from '../middleware/errorHandler';
import { createLogger, Logger } from '../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export class StatsService {
  private readonly logger: Logger;

  constructor(
    private readonly messages: MessageLogStore,
    private readonly moderation: ModerationStore,
  ) {
    this.logger = createLogger('StatsService');
  }

  async recordMessage(data: CreateMessageRecordData): Promise<MessageRecord> {
    const result = await this.messages.append(data);
    if (!result.success || !result.data) {
      throw new DatabaseError(result.error);
    }
    return result.data;
  }

  /**
   * total_messages and unique_users cover the chat's whole history;
   * recent_messages and moderation_actions cover the last `days` days.
   */
  async getChatStats(
    botId: number,
    chatId: string,
    days = 7,
    now: Date = new Date(),
  ): Promise<ChatStats> {
    const since = new Date(now.getTime() - days * DAY_MS);

    const [counts, actions] = await Promise.all([
      this.messages.countMessages(botId, chatId, since),
      this.moderation.countActions(botId, chatId, since),
    ]);

    if (!counts.success || !counts.data) {
      throw new DatabaseError(counts.error);
    }
    if (!actions.success) {
      throw new DatabaseError(actions.error);
    }

    this.logger.debug('Chat stats computed', { botId, chatId, days });

    return {
      ...counts.data,
      moderation_actions: actions.data ?? 0,
      period_days: days,
    };
  }
}
