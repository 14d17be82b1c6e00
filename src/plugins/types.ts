/**
 * Plugin contracts. A plugin is either a message plugin (sees plain text)
 * or a command plugin (sees parsed /commands); the registry dispatches
 * each kind separately.
 */

import { BotConfig, ChatType, MessageType } from '../database/models';
import { ConfigService } from '../services/ConfigService';
import { StatsService } from '../services/StatsService';

export interface ChatMessage {
  bot_id: number;
  chat_id: string;
  chat_name?: string;
  chat_type?: ChatType;
  user_id: string;
  user_name?: string;
  text?: string;
  message_type: MessageType;
  is_admin: boolean;
}

export interface PluginServices {
  configs: ConfigService;
  stats: StatsService;
}

export interface PluginContext {
  message: ChatMessage;
  config: BotConfig;
  services: PluginServices;
}

export interface ParsedCommand {
  name: string;
  args: string;
}

export type PluginResult = string | undefined;

export interface MessagePlugin {
  kind: 'message';
  name: string;
  onMessage(context: PluginContext): Promise<PluginResult> | PluginResult;
}

export interface CommandPlugin {
  kind: 'command';
  name: string;
  /** Returns undefined for commands the plugin does not handle */
  onCommand(
    command: ParsedCommand,
    context: PluginContext,
  ): Promise<PluginResult> | PluginResult;
}

export type ChatPlugin = MessagePlugin | CommandPlugin;

export interface PluginReply {
  text: string;
  source: string;
}
