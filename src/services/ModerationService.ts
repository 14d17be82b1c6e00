/**
 * ModerationService - turns classifier violations into moderation plans
 */

import {
  BotConfig,
  ModerationActionType,
  UserKey,
  ViolationDecision,
  ViolationVerdict,
} from '../database/models';
import { ModerationStore } from '../database/stores';
import { DatabaseError } from '../middleware/errorHandler';
import { formatDuration } from '../utils/format';
import { createLogger, Logger } from '../utils/logger';

export interface ModerationPlan {
  deleteMessage: true;
  action: ModerationActionType;
  verdict: ViolationVerdict;
  reason?: string;
  muteSeconds: number;
  /** Warning count after this violation; 0 once the user is muted */
  warnings: number;
  threshold: number;
  notice: string;
}

export interface PlanOptions {
  userName?: string;
}

const VERDICT_LABELS: Record<ViolationVerdict, string> = {
  spam: 'спам',
  offensive: 'запрещенные слова',
  advertisement: 'реклама',
};

const HOUR_MS = 60 * 60 * 1000;

export class ModerationService {
  private readonly logger: Logger;

  constructor(private readonly store: ModerationStore) {
    this.logger = createLogger('ModerationService');
  }

  /**
   * Every violation deletes the message and counts as a warning. Reaching
   * warn_threshold mutes the user for mute_duration seconds and resets the
   * counter; a mute_duration of 0 disables muting.
   */
  async plan(
    decision: ViolationDecision,
    config: Pick<BotConfig, 'warn_threshold' | 'mute_duration'>,
    key: UserKey,
    options: PlanOptions = {},
  ): Promise<ModerationPlan> {
    const resetAt = config.mute_duration > 0 ? config.warn_threshold : undefined;
    const counted = await this.store.addWarning(key, resetAt);
    if (!counted.success || counted.data === undefined) {
      throw new DatabaseError(counted.error);
    }

    const warnings = counted.data;
    const shouldMute = resetAt !== undefined && warnings >= resetAt;
    const action: ModerationActionType = shouldMute ? 'mute' : 'warn';
    const muteSeconds = shouldMute ? config.mute_duration : 0;
    const remaining = shouldMute ? 0 : warnings;

    const recorded = await this.store.recordAction({
      ...key,
      action,
      verdict: decision.verdict,
      reason: decision.reason,
      duration: muteSeconds,
    });
    if (!recorded.success) {
      this.logger.error('Moderation action was applied but not logged', {
        ...key,
        action,
        error: recorded.error,
      });
    }

    this.logger.info('Moderation plan created', {
      ...key,
      verdict: decision.verdict,
      action,
      warnings: remaining,
    });

    const plan = {
      deleteMessage: true as const,
      action,
      verdict: decision.verdict,
      reason: decision.reason,
      muteSeconds,
      warnings: remaining,
      threshold: config.warn_threshold,
    };
    return {
      ...plan,
      notice: this.buildNotice(
        plan,
        warnings,
        config.mute_duration > 0,
        options.userName,
      ),
    };
  }

  /**
   * Drops warning counters untouched for longer than ttlHours
   */
  async purgeExpiredWarnings(
    ttlHours: number,
    now: Date = new Date(),
  ): Promise<number> {
    const cutoff = new Date(now.getTime() - ttlHours * HOUR_MS);
    const result = await this.store.purgeWarnings(cutoff);
    if (!result.success) {
      throw new DatabaseError(result.error);
    }

    const purged = result.data ?? 0;
    this.logger.info('Expired warnings purged', {
      purged,
      cutoff: cutoff.toISOString(),
    });
    return purged;
  }

  private buildNotice(
    plan: Omit<ModerationPlan, 'notice'>,
    count: number,
    mutingEnabled: boolean,
    userName?: string,
  ): string {
    const who = userName ? `${userName}, ` : '';
    const why = plan.reason ?? VERDICT_LABELS[plan.verdict];

    if (plan.action === 'mute') {
      return `🔇 ${who}вы ограничены на ${formatDuration(plan.muteSeconds)}. Причина: ${why}`;
    }

    const progress = mutingEnabled ? ` ${count}/${plan.threshold}` : '';
    return `⚠️ ${who}предупреждение${progress}. Причина: ${why}`;
  }
}
