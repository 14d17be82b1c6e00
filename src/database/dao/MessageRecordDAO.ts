/**
 * MessageRecordDAO - append-only message log used for chat statistics
 */

import { db } from '../connection';
import {
  CreateMessageRecordData,
  DatabaseResult,
  MessageCounts,
  MessageRecord,
  parseMessageType,
} from '../models';
import { MessageLogStore } from '../stores';
import { createLogger, Logger } from '../../utils/logger';

export type MessageRecordRow = {
  record_id: string | number;
  bot_id: number;
  chat_id: string;
  user_id: string;
  message_type: string;
  created_at: Date;
};

type MessageCountsRow = {
  total_messages: string | number;
  recent_messages: string | number;
  unique_users: string | number;
};

export class MessageRecordDAO implements MessageLogStore {
  private logger: Logger;

  constructor() {
    this.logger = createLogger('MessageRecordDAO');
  }

  /**
   * Добавляет запись в журнал сообщений
   */
  async append(
    data: CreateMessageRecordData,
  ): Promise<DatabaseResult<MessageRecord>> {
    try {
      const query = `
        INSERT INTO message_records (bot_id, chat_id, user_id, message_type, created_at)
        VALUES ($1, $2, $3, $4, COALESCE($5, NOW()))
        RETURNING *
      `;

      const result = await db.query<MessageRecordRow>(query, [
        data.bot_id,
        data.chat_id,
        data.user_id,
        data.message_type,
        data.created_at ?? null,
      ]);

      const row = result.rows[0];
      return {
        success: true,
        data: {
          record_id: Number(row.record_id),
          bot_id: Number(row.bot_id),
          chat_id: String(row.chat_id),
          user_id: String(row.user_id),
          message_type: parseMessageType(row.message_type),
          created_at: new Date(row.created_at),
        },
        affected_rows: result.rowCount || 0,
      };
    } catch (error) {
      this.logger.error('Failed to append message record', {
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
   * Считает сообщения и уникальных пользователей чата
   */
  async countMessages(
    botId: number,
    chatId: string,
    since: Date,
  ): Promise<DatabaseResult<MessageCounts>> {
    try {
      const query = `
        SELECT
          COUNT(*) AS total_messages,
          COUNT(CASE WHEN created_at >= $3 THEN 1 END) AS recent_messages,
          COUNT(DISTINCT user_id) AS unique_users
        FROM message_records
        WHERE bot_id = $1 AND chat_id = $2
      `;

      const result = await db.query<MessageCountsRow>(query, [
        botId,
        chatId,
        since,
      ]);
      const row = result.rows[0];

      return {
        success: true,
        data: {
          total_messages: Number(row?.total_messages ?? 0),
          recent_messages: Number(row?.recent_messages ?? 0),
          unique_users: Number(row?.unique_users ?? 0),
        },
      };
    } catch (error) {
      this.logger.error('Failed to count messages', { botId, chatId, error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}

export const messageRecordDAO = new MessageRecordDAO();
