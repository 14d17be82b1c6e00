/**
 * Chat configuration routes - admin API over per-chat bot configurations
 */

import express, { Request, Response } from 'express';
import { z } from 'zod';
import { BotConfig } from '../database/models';
import { asyncHandler } from '../middleware/errorHandler';
import { ConfigService } from '../services/ConfigService';
import {
  AdvertisementPredicate,
  classify,
  neverAdvertisement,
} from '../services/MessageClassifier';
import { resolve } from '../services/ResponseResolver';
import { StatsService } from '../services/StatsService';
import { TemplateService } from '../services/TemplateService';
import logger from '../utils/logger';
import {
  botIdSchema,
  chatIdSchema,
  parseOrThrow,
  statsDaysSchema,
  templateIdSchema,
  updateBotConfigSchema,
} from '../utils/validation';

export interface ConfigRoutesDeps {
  configs: ConfigService;
  stats: StatsService;
  templates: TemplateService;
  isAdvertisement?: AdvertisementPredicate;
}

const classifyBodySchema = z.object({
  text: z.string().min(1, { message: 'Text is required' }).max(10000),
});

const chatParams = (req: Request): { botId: number; chatId: string } => ({
  botId: parseOrThrow(botIdSchema, req.params.botId),
  chatId: parseOrThrow(chatIdSchema, req.params.chatId),
});

const toResponse = (config: BotConfig) => ({
  bot_id: config.bot_id,
  chat_id: config.chat_id,
  chat_name: config.chat_name,
  chat_type: config.chat_type,
  welcome_message: config.welcome_message,
  auto_responses: config.auto_responses,
  blocked_words: config.blocked_words,
  commands: config.commands,
  warn_threshold: config.warn_threshold,
  mute_duration: config.mute_duration,
  max_message_length: config.max_message_length,
  created_at: config.created_at,
  updated_at: config.updated_at,
});

export function createConfigRoutes(deps: ConfigRoutesDeps): express.Router {
  const router = express.Router();
  const routeLogger = logger.child({ module: 'ConfigRoutes' });
  const isAdvertisement = deps.isAdvertisement ?? neverAdvertisement;

  /**
   * GET /api/bots/:botId/chats
   */
  router.get(
    '/:botId/chats',
    asyncHandler(async (req: Request, res: Response) => {
      const botId = parseOrThrow(botIdSchema, req.params.botId);
      const configs = await deps.configs.listConfigs(botId);

      res.json({
        success: true,
        data: configs.map(toResponse),
        count: configs.length,
      });
    }),
  );

  router.get(
    '/:botId/chats/:chatId',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      const config = await deps.configs.getConfig(botId, chatId);
      res.json({ success: true, data: toResponse(config) });
    }),
  );

  /**
   * PUT /api/bots/:botId/chats/:chatId
   * Partial update; creates the chat configuration when it does not exist
   */
  router.put(
    '/:botId/chats/:chatId',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      const update = parseOrThrow(updateBotConfigSchema, req.body);
      const existing = await deps.configs.findConfig(botId, chatId);
      if (!existing) {
        await deps.configs.ensureConfig(botId, chatId);
      }

      const config = await deps.configs.updateConfig(botId, chatId, update);
      routeLogger.info('Chat configuration updated', { botId, chatId });

      res.status(existing ? 200 : 201).json({
        success: true,
        data: toResponse(config),
        message: existing
          ? 'Configuration updated successfully'
          : 'Configuration created successfully',
      });
    }),
  );

  router.delete(
    '/:botId/chats/:chatId',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      await deps.configs.deleteConfig(botId, chatId);
      routeLogger.info('Chat configuration deleted', { botId, chatId });

      res.json({
        success: true,
        message: 'Configuration deleted successfully',
      });
    }),
  );

  router.post(
    '/:botId/chats/:chatId/reset',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      const config = await deps.configs.resetConfig(botId, chatId);
      routeLogger.info('Chat configuration reset', { botId, chatId });

      res.json({
        success: true,
        data: toResponse(config),
        message: 'Configuration reset to defaults',
      });
    }),
  );

  router.get(
    '/:botId/chats/:chatId/export',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      const exported = await deps.configs.exportConfig(botId, chatId);

      res
        .attachment(`bot-${botId}-chat-${chatId}.json`)
        .json(exported);
    }),
  );

  /**
   * POST /api/bots/:botId/chats/:chatId/templates/:templateId/apply
   */
  router.post(
    '/:botId/chats/:chatId/templates/:templateId/apply',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      const templateId = parseOrThrow(templateIdSchema, req.params.templateId);
      const config = await deps.templates.applyTemplate(botId, chatId, templateId);

      res.json({
        success: true,
        data: toResponse(config),
        message: 'Template applied successfully',
      });
    }),
  );

  /**
   * GET /api/bots/:botId/chats/:chatId/stats?days=N
   */
  router.get(
    '/:botId/chats/:chatId/stats',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      const days = parseOrThrow(statsDaysSchema, req.query.days);
      const stats = await deps.stats.getChatStats(botId, chatId, days);

      res.json({ success: true, data: stats });
    }),
  );

  /**
   * POST /api/bots/:botId/chats/:chatId/classify
   * Dry run of moderation and auto-responses for a text; nothing is recorded
   */
  router.post(
    '/:botId/chats/:chatId/classify',
    asyncHandler(async (req: Request, res: Response) => {
      const { botId, chatId } = chatParams(req);
      const { text } = parseOrThrow(classifyBodySchema, req.body);
      const config = await deps.configs.getConfig(botId, chatId);

      const decision = classify(text, config, { isAdvertisement });
      const reply = decision.verdict === 'ok' ? resolve(text, config) : undefined;

      res.json({
        success: true,
        data: {
          decision,
          reply: reply ?? null,
        },
      });
    }),
  );

  return router;
}
