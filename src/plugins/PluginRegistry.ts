/**
 * PluginRegistry - explicit plugin registration and ordered dispatch
 */

import { ConflictError } from '../middleware/errorHandler';
import { createLogger, Logger } from '../utils/logger';
import {
  ChatPlugin,
  CommandPlugin,
  MessagePlugin,
  ParsedCommand,
  PluginContext,
  PluginReply,
  PluginResult,
} from './types';

export class PluginRegistry {
  private readonly plugins: ChatPlugin[] = [];
  private readonly logger: Logger;

  constructor() {
    this.logger = createLogger('PluginRegistry');
  }

  register(plugin: ChatPlugin): this {
    if (this.plugins.some((existing) => existing.name === plugin.name)) {
      throw new ConflictError(`Plugin "${plugin.name}" is already registered`);
    }
    this.plugins.push(plugin);
    this.logger.debug('Plugin registered', {
      name: plugin.name,
      kind: plugin.kind,
    });
    return this;
  }

  get names(): string[] {
    return this.plugins.map((plugin) => plugin.name);
  }

  /**
   * Offers plain text to message plugins in registration order;
   * the first reply wins.
   */
  async dispatchMessage(
    context: PluginContext,
  ): Promise<PluginReply | undefined> {
    const plugins = this.plugins.filter(
      (plugin): plugin is MessagePlugin => plugin.kind === 'message',
    );
    for (const plugin of plugins) {
      const reply = await this.run(plugin, context, () =>
        plugin.onMessage(context),
      );
      if (reply) {
        return reply;
      }
    }
    return undefined;
  }

  async dispatchCommand(
    command: ParsedCommand,
    context: PluginContext,
  ): Promise<PluginReply | undefined> {
    const plugins = this.plugins.filter(
      (plugin): plugin is CommandPlugin => plugin.kind === 'command',
    );
    for (const plugin of plugins) {
      const reply = await this.run(plugin, context, () =>
        plugin.onCommand(command, context),
      );
      if (reply) {
        return reply;
      }
    }
    return undefined;
  }

  // A failing plugin is logged and skipped so the next one still gets a turn
  private async run(
    plugin: ChatPlugin,
    context: PluginContext,
    handler: () => Promise<PluginResult> | PluginResult,
  ): Promise<PluginReply | undefined> {
    try {
      const text = await handler();
      return text ? { text, source: plugin.name } : undefined;
    } catch (error) {
      this.logger.error('Plugin failed', {
        plugin: plugin.name,
        botId: context.message.bot_id,
        chatId: context.message.chat_id,
        error,
      });
      return undefined;
    }
  }
}
