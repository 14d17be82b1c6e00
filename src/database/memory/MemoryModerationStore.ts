import {
  CreateModerationActionData,
  DatabaseResult,
  ModerationAction,
  UserKey,
} from '../models';
import { ModerationStore } from '../stores';

interface WarningEntry {
  warnings: number;
  updated_at: Date;
}

const keyOf = (key: UserKey): string =>
  JSON.stringify([key.bot_id, key.chat_id, key.user_id]);

export class MemoryModerationStore implements ModerationStore {
  private readonly actions: ModerationAction[] = [];
  private readonly warnings = new Map<string, WarningEntry>();
  private nextId = 1;

  async recordAction(
    data: CreateModerationActionData,
  ): Promise<DatabaseResult<ModerationAction>> {
    const action: ModerationAction = Object.freeze({
      ...data,
      action_id: this.nextId++,
      created_at: new Date(),
    });
    this.actions.push(action);
    return { success: true, data: action, affected_rows: 1 };
  }

  async countActions(
    botId: number,
    chatId: string,
    since: Date,
  ): Promise<DatabaseResult<number>> {
    const total = this.actions.filter(
      (action) =>
        action.bot_id === botId &&
        action.chat_id === chatId &&
        action.created_at >= since,
    ).length;
    return { success: true, data: total };
  }

  async getWarnings(key: UserKey): Promise<DatabaseResult<number>> {
    return { success: true, data: this.warnings.get(keyOf(key))?.warnings ?? 0 };
  }

  async addWarning(
    key: UserKey,
    resetAt?: number,
  ): Promise<DatabaseResult<number>> {
    const id = keyOf(key);
    const warnings = (this.warnings.get(id)?.warnings ?? 0) + 1;
    if (resetAt !== undefined && warnings >= resetAt) {
      this.warnings.delete(id);
    } else {
      this.warnings.set(id, { warnings, updated_at: new Date() });
    }
    return { success: true, data: warnings, affected_rows: 1 };
  }

  async purgeWarnings(updatedBefore: Date): Promise<DatabaseResult<number>> {
    let purged = 0;
    for (const [key, entry] of this.warnings) {
      if (entry.updated_at < updatedBefore) {
        this.warnings.delete(key);
        purged++;
      }
    }
    return { success: true, data: purged };
  }
}
