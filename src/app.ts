import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import throttle from 'express-throttle';
import { createConfigRoutes } from './routes/configs';
import { createTemplateRoutes } from './routes/templates';
import {
  errorHandler,
  notFoundHandler,
  requestLogger,
  requireAdminToken,
  requireWebhookSecret,
} from './middleware/errorHandler';
import { ConfigService } from './services/ConfigService';
import { StatsService } from './services/StatsService';
import { TemplateService } from './services/TemplateService';
import { AdvertisementPredicate } from './services/MessageClassifier';
import { TelegramBotService } from './bot/TelegramBot';

export interface AppDeps {
  configs: ConfigService;
  stats: StatsService;
  templates: TemplateService;
  adminApiToken: string;
  isAdvertisement?: AdvertisementPredicate;
  bot?: TelegramBotService;
  /** Where Telegram posts updates, and the secret it sends with them */
  webhook?: { path: string; secret: string };
  rateLimit?: string;
}

export function createApp(deps: AppDeps): express.Application {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Webhook deliveries bypass the throttle
  const bot = deps.bot;
  const webhook = deps.webhook;
  if (bot && webhook) {
    app.post(webhook.path, requireWebhookSecret(webhook.secret), (req, res) => {
      bot.processUpdate(req.body);
      res.sendStatus(200);
    });
  }

  app.use(
    throttle({
      rate: deps.rateLimit ?? '100/m',
      burst: 20,
      on_throttled: (req, res) => {
        res
          .status(503)
          .json({ message: 'Too many requests, please try again later.' });
      },
    }),
  );

  app.use(requestLogger);

  app.get('/health', (req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || 'development',
      bot: deps.bot?.isReady() ?? false,
    });
  });

  app.use(
    '/api/bots',
    requireAdminToken(deps.adminApiToken),
    createConfigRoutes({
      configs: deps.configs,
      stats: deps.stats,
      templates: deps.templates,
      isAdvertisement: deps.isAdvertisement,
    }),
  );

  app.use(
    '/api/templates',
    requireAdminToken(deps.adminApiToken),
    createTemplateRoutes({ templates: deps.templates }),
  );

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
