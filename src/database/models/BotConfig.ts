/**
 * BotConfig model - per (bot, chat) configuration of auto-responses,
 * moderation filters and commands
 */

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface AutoResponse {
  trigger: string;
  reply: string;
}

export interface BotConfigSettings {
  welcome_message?: string;
  auto_responses: AutoResponse[]; // Order is kept; see ResponseResolver
  blocked_words: string[];
  commands: Record<string, string>; // name -> description
  warn_threshold: number; // Warnings before a mute
  mute_duration: number; // Seconds, 0 disables muting
  max_message_length: number;
}

export interface BotConfig extends BotConfigSettings {
  bot_id: number;
  chat_id: string;
  chat_name?: string;
  chat_type?: ChatType;
  created_at: Date;
  updated_at: Date;
}

export interface ChatInfo {
  chat_name?: string;
  chat_type?: ChatType;
}

export interface UpdateBotConfigData extends Partial<BotConfigSettings> {
  chat_name?: string;
}

export const defaultBotConfigSettings: BotConfigSettings = {
  auto_responses: [],
  blocked_words: [],
  commands: {},
  warn_threshold: 3,
  mute_duration: 300,
  max_message_length: 1000,
};

/**
 * Portable form of a chat configuration, without identity or timestamps
 */
export interface BotConfigExport extends BotConfigSettings {
  chat_name?: string;
  chat_type?: ChatType;
  exported_at: string;
}
