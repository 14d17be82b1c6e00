/**
 * TelegramBot - адаптер Telegram Bot API для конвейера сообщений
 */

import TelegramBot from 'node-telegram-bot-api';
import { ChatType, MessageType } from '../database/models';
import { BUILT_IN_COMMANDS } from '../plugins/commands';
import { ChatMessage } from '../plugins/types';
import { MessagePipeline, PipelineOutcome } from '../services/MessagePipeline';
import { createLogger, Logger } from '../utils/logger';

export interface TelegramBotOptions {
  token: string;
  botId: number;
  webhookUrl?: string;
  webhookSecret?: string;
  adminUserIds?: ReadonlySet<number>;
}

const ADMIN_STATUSES: ReadonlyArray<TelegramBot.ChatMemberStatus> = [
  'creator',
  'administrator',
];

const MUTE_PERMISSIONS: TelegramBot.ChatPermissions = {
  can_send_messages: false,
  can_send_polls: false,
  can_send_other_messages: false,
  can_add_web_page_previews: false,
};

/**
 * Определяет тип сообщения для журнала
 */
export function detectMessageType(msg: TelegramBot.Message): MessageType {
  if (msg.text) return 'text';
  // animation приходит вместе с document, поэтому проверяется раньше
  if (msg.animation) return 'animation';
  if (msg.photo) return 'photo';
  if (msg.video) return 'video';
  if (msg.document) return 'document';
  if (msg.audio) return 'audio';
  if (msg.voice) return 'voice';
  if (msg.sticker) return 'sticker';
  return 'other';
}

const chatNameOf = (chat: TelegramBot.Chat): string | undefined =>
  chat.title ?? chat.username ?? chat.first_name;

const userNameOf = (user: TelegramBot.User): string =>
  user.username ? `@${user.username}` : user.first_name;

const chatTypeOf = (chat: TelegramBot.Chat): ChatType => chat.type;

export class TelegramBotService {
  private readonly bot: TelegramBot;
  private readonly logger: Logger;
  private readonly polling: boolean;
  private readonly adminUserIds: ReadonlySet<number>;
  private isInitialized = false;

  constructor(
    private readonly options: TelegramBotOptions,
    private readonly pipeline: MessagePipeline,
  ) {
    this.logger = createLogger('TelegramBot');
    this.polling = !options.webhookUrl;
    this.adminUserIds = options.adminUserIds ?? new Set();

    // В режиме webhook обновления приходят через processUpdate
    this.bot = new TelegramBot(options.token, { polling: this.polling });
  }

  /**
   * Инициализирует бота
   */
  async initialize(): Promise<void> {
    try {
      this.logger.info('Initializing Telegram Bot...');

      if (this.options.webhookUrl) {
        await this.bot.setWebHook(this.options.webhookUrl, {
          secret_token: this.options.webhookSecret,
        });
        this.logger.info('Webhook set successfully', {
          url: this.options.webhookUrl,
        });
      }

      const botInfo = await this.bot.getMe();
      this.logger.info('Bot initialized successfully', {
        username: botInfo.username,
        id: botInfo.id,
        botId: this.options.botId,
      });

      await this.attempt('setMyCommands', {}, () =>
        this.bot.setMyCommands(
          BUILT_IN_COMMANDS.filter((command) => !command.adminOnly).map(
            (command) => ({
              command: command.name,
              description: command.description,
            }),
          ),
        ),
      );

      this.setupHandlers();
      this.isInitialized = true;
    } catch (error) {
      this.logger.error('Failed to initialize Telegram Bot', { error });
      throw error;
    }
  }

  private setupHandlers(): void {
    this.bot.on('message', (msg) => {
      this.handleIncoming(msg).catch((error) => {
        this.logger.error('Failed to handle message', {
          chatId: msg.chat.id,
          messageId: msg.message_id,
          error,
        });
      });
    });

    this.bot.on('polling_error', (error) => {
      this.logger.error('Polling error', { error });
    });

    this.bot.on('webhook_error', (error) => {
      this.logger.error('Webhook error', { error });
    });
  }

  /**
   * Передает входящее сообщение в конвейер и выполняет результат
   */
  async handleIncoming(
    msg: TelegramBot.Message,
  ): Promise<PipelineOutcome | undefined> {
    const from = msg.from;
    if (!from || from.is_bot) {
      return undefined;
    }

    const chat = {
      bot_id: this.options.botId,
      chat_id: String(msg.chat.id),
      chat_name: chatNameOf(msg.chat),
      chat_type: chatTypeOf(msg.chat),
    };

    if (msg.new_chat_members && msg.new_chat_members.length > 0) {
      const outcome = await this.pipeline.handleNewMembers(chat);
      await this.execute(msg, outcome);
      return outcome;
    }

    const message: ChatMessage = {
      ...chat,
      user_id: String(from.id),
      user_name: userNameOf(from),
      text: msg.text ?? msg.caption,
      message_type: detectMessageType(msg),
      is_admin: await this.isAdmin(msg.chat, from.id),
    };

    const outcome = await this.pipeline.handleMessage(message);
    await this.execute(msg, outcome);
    return outcome;
  }

  /**
   * Обрабатывает обновление, полученное через webhook
   */
  processUpdate(update: TelegramBot.Update): void {
    this.bot.processUpdate(update);
  }

  private async isAdmin(chat: TelegramBot.Chat, userId: number): Promise<boolean> {
    if (this.adminUserIds.has(userId) || chat.type === 'private') {
      return true;
    }
    try {
      const member = await this.bot.getChatMember(chat.id, userId);
      return ADMIN_STATUSES.includes(member.status);
    } catch (error) {
      this.logger.warn('Failed to check member status', {
        chatId: chat.id,
        userId,
        error,
      });
      return false;
    }
  }

  private async execute(
    msg: TelegramBot.Message,
    outcome: PipelineOutcome,
  ): Promise<void> {
    const chatId = msg.chat.id;

    switch (outcome.kind) {
      case 'silent':
        return;
      case 'reply': {
        const { text, source } = outcome;
        await this.attempt('sendMessage', { chatId, source }, () =>
          this.bot.sendMessage(chatId, text),
        );
        return;
      }
      case 'moderation': {
        const { plan } = outcome;
        const userId = msg.from?.id;

        await this.attempt('deleteMessage', { chatId, messageId: msg.message_id }, () =>
          this.bot.deleteMessage(chatId, msg.message_id),
        );

        if (plan.action === 'mute' && userId !== undefined) {
          const untilDate = Math.floor(Date.now() / 1000) + plan.muteSeconds;
          await this.attempt('restrictChatMember', { chatId, userId }, () =>
            this.bot.restrictChatMember(chatId, userId, {
              permissions: MUTE_PERMISSIONS,
              until_date: untilDate,
            }),
          );
        }

        await this.attempt('sendMessage', { chatId, verdict: plan.verdict }, () =>
          this.bot.sendMessage(chatId, plan.notice),
        );
        return;
      }
    }
  }

  // Ошибки Telegram API логируются и не прерывают обработку
  private async attempt(
    operation: string,
    meta: Record<string, unknown>,
    action: () => Promise<unknown>,
  ): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (error) {
      this.logger.error(`Telegram ${operation} failed`, { ...meta, error });
      return false;
    }
  }

  /**
   * Останавливает бота
   */
  async stop(): Promise<void> {
    try {
      if (this.polling) {
        await this.bot.stopPolling();
      }
      this.isInitialized = false;
      this.logger.info('Bot stopped successfully');
    } catch (error) {
      this.logger.error('Error stopping bot', { error });
    }
  }

  getBotInstance(): TelegramBot {
    return this.bot;
  }

  isReady(): boolean {
    return this.isInitialized;
  }
}
