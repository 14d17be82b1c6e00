/**
 * Moderation models - classifier verdicts, applied actions and warning counters
 */

export type ModerationVerdict = 'ok' | 'spam' | 'offensive' | 'advertisement';

export type ViolationVerdict = Exclude<ModerationVerdict, 'ok'>;

export interface ModerationDecision {
  verdict: ModerationVerdict;
  reason?: string;
}

export interface ViolationDecision extends ModerationDecision {
  verdict: ViolationVerdict;
}

export const isViolation = (
  decision: ModerationDecision,
): decision is ViolationDecision => decision.verdict !== 'ok';

export type ModerationActionType = 'warn' | 'mute';

export interface ModerationAction {
  readonly action_id: number;
  readonly bot_id: number;
  readonly chat_id: string;
  readonly user_id: string;
  readonly action: ModerationActionType;
  readonly verdict: ViolationVerdict;
  readonly reason?: string;
  readonly duration: number; // Seconds, 0 for warnings
  readonly created_at: Date;
}

export interface CreateModerationActionData {
  bot_id: number;
  chat_id: string;
  user_id: string;
  action: ModerationActionType;
  verdict: ViolationVerdict;
  reason?: string;
  duration: number;
}

export interface UserKey {
  bot_id: number;
  chat_id: string;
  user_id: string;
}
