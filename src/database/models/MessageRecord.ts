/**
 * MessageRecord model - append-only log entry of a processed chat message
 */

export type MessageType =
  | 'text'
  | 'command'
  | 'photo'
  | 'video'
  | 'document'
  | 'audio'
  | 'voice'
  | 'sticker'
  | 'animation'
  | 'other';

export const MESSAGE_TYPES: readonly MessageType[] = [
  'text',
  'command',
  'photo',
  'video',
  'document',
  'audio',
  'voice',
  'sticker',
  'animation',
  'other',
];

export const parseMessageType = (value: string): MessageType =>
  MESSAGE_TYPES.find((type) => type === value) ?? 'other';

export interface MessageRecord {
  readonly record_id: number;
  readonly bot_id: number;
  readonly chat_id: string;
  readonly user_id: string;
  readonly message_type: MessageType;
  readonly created_at: Date;
}

export interface CreateMessageRecordData {
  bot_id: number;
  chat_id: string;
  user_id: string;
  message_type: MessageType;
  created_at?: Date;
}

export interface MessageCounts {
  total_messages: number;
  recent_messages: number;
  unique_users: number;
}

export interface ChatStats extends MessageCounts {
  moderation_actions: number;
  period_days: number;
}
