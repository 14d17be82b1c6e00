/**
 * ModerationDAO - moderation action log and per-user warning counters
 */

import { db } from '../connection';
import {
  CreateModerationActionData,
  DatabaseResult,
  ModerationAction,
  UserKey,
} from '../models';
import { ModerationStore } from '../stores';
import { createLogger, Logger } from '../../utils/logger';

export type ModerationActionRow = {
  action_id: string | number;
  bot_id: number;
  chat_id: string;
  user_id: string;
  action: string;
  verdict: string;
  reason: string | null;
  duration: number;
  created_at: Date;
};

type CountRow = { total: string | number };

type WarningsRow = { warnings: number };

export class ModerationDAO implements ModerationStore {
  private logger: Logger;

  constructor() {
    this.logger = createLogger('ModerationDAO');
  }

  async recordAction(
    data: CreateModerationActionData,
  ): Promise<DatabaseResult<ModerationAction>> {
    try {
      const query = `
        INSERT INTO moderation_actions (bot_id, chat_id, user_id, action, verdict, reason, duration)
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING action_id, created_at
      `;

      const result = await db.query<
        Pick<ModerationActionRow, 'action_id' | 'created_at'>
      >(query, [
        data.bot_id,
        data.chat_id,
        data.user_id,
        data.action,
        data.verdict,
        data.reason ?? null,
        data.duration,
      ]);

      const row = result.rows[0];
      return {
        success: true,
        data: {
          ...data,
          action_id: Number(row.action_id),
          created_at: new Date(row.created_at),
        },
        affected_rows: result.rowCount || 0,
      };
    } catch (error) {
      this.logger.error('Failed to record moderation action', {
        chatId: data.chat_id,
        userId: data.user_id,
        error,
      });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  async countActions(
    botId: number,
    chatId: string,
    since: Date,
  ): Promise<DatabaseResult<number>> {
    try {
      const result = await db.query<CountRow>(
        `SELECT COUNT(*) AS total FROM moderation_actions
         WHERE bot_id = $1 AND chat_id = $2 AND created_at >= $3`,
        [botId, chatId, since],
      );
      return { success: true, data: Number(result.rows[0]?.total ?? 0) };
    } catch (error) {
      this.logger.error('Failed to count moderation actions', {
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

  async getWarnings(key: UserKey): Promise<DatabaseResult<number>> {
    try {
      const result = await db.query<WarningsRow>(
        `SELECT warnings FROM user_warnings
         WHERE bot_id = $1 AND chat_id = $2 AND user_id = $3`,
        [key.bot_id, key.chat_id, key.user_id],
      );
      return { success: true, data: Number(result.rows[0]?.warnings ?? 0) };
    } catch (error) {
      this.logger.error('Failed to load warnings', { ...key, error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * The upsert locks the counter row until commit, so concurrent
   * violations by one user are counted one after another.
   */
  async addWarning(
    key: UserKey,
    resetAt?: number,
  ): Promise<DatabaseResult<number>> {
    const params = [key.bot_id, key.chat_id, key.user_id];
    try {
      const warnings = await db.transaction(async (query) => {
        const result = await query<WarningsRow>(
          `INSERT INTO user_warnings (bot_id, chat_id, user_id, warnings, updated_at)
           VALUES ($1, $2, $3, 1, NOW())
           ON CONFLICT (bot_id, chat_id, user_id)
           DO UPDATE SET warnings = user_warnings.warnings + 1, updated_at = NOW()
           RETURNING warnings`,
          params,
        );
        const count = Number(result.rows[0].warnings);

        if (resetAt !== undefined && count >= resetAt) {
          await query(
            `DELETE FROM user_warnings
             WHERE bot_id = $1 AND chat_id = $2 AND user_id = $3`,
            params,
          );
        }
        return count;
      });

      return { success: true, data: warnings, affected_rows: 1 };
    } catch (error) {
      this.logger.error('Failed to add warning', { ...key, error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  async purgeWarnings(updatedBefore: Date): Promise<DatabaseResult<number>> {
    try {
      const result = await db.query(
        'DELETE FROM user_warnings WHERE updated_at < $1',
        [updatedBefore],
      );
      return { success: true, data: result.rowCount || 0 };
    } catch (error) {
      this.logger.error('Failed to purge warnings', { error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}

export const moderationDAO = new ModerationDAO();
