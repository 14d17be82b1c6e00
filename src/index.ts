import { loadConfig } from './config';
import { createApp } from './app';
import { createLogger, setLogLevel } from './utils/logger';
import { db } from './database/connection';
import { createStores } from './database/stores';
import { ConfigService } from './services/ConfigService';
import { ModerationService } from './services/ModerationService';
import { StatsService } from './services/StatsService';
import { TemplateService } from './services/TemplateService';
import { MessagePipeline } from './services/MessagePipeline';
import { createPatternAdvertisementPredicate } from './services/MessageClassifier';
import { PluginRegistry } from './plugins/PluginRegistry';
import { AdminCommandsPlugin } from './plugins/AdminCommandsPlugin';
import { helpPlugin } from './plugins/HelpPlugin';
import { autoResponsePlugin } from './plugins/AutoResponsePlugin';
import { TelegramBotService } from './bot/TelegramBot';
import { MaintenanceScheduler } from './jobs/MaintenanceScheduler';

const logger = createLogger('Main');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const stores = await createStores(config.storageDriver);

  const configs = new ConfigService(stores.configs);
  const moderation = new ModerationService(stores.moderation);
  const stats = new StatsService(stores.messages, stores.moderation);
  const templates = new TemplateService(stores.templates, configs);
  const isAdvertisement = createPatternAdvertisementPredicate(config.adPatterns);

  // Registration order is dispatch order
  const plugins = new PluginRegistry()
    .register(new AdminCommandsPlugin())
    .register(helpPlugin)
    .register(autoResponsePlugin);

  const pipeline = new MessagePipeline({
    configs,
    moderation,
    stats,
    plugins,
    isAdvertisement,
  });

  const bot = new TelegramBotService(
    {
      token: config.botToken,
      botId: config.botId,
      webhookUrl: config.webhookUrl,
      webhookSecret: config.webhookSecret,
      adminUserIds: config.adminUserIds,
    },
    pipeline,
  );

  const app = createApp({
    configs,
    stats,
    templates,
    adminApiToken: config.adminApiToken,
    isAdvertisement,
    bot,
    webhook:
      config.webhookUrl && config.webhookSecret
        ? {
            path: new URL(config.webhookUrl).pathname,
            secret: config.webhookSecret,
          }
        : undefined,
  });

  const scheduler = new MaintenanceScheduler(moderation, {
    cronTime: config.maintenanceCron,
    warningTtlHours: config.warningTtlHours,
  });

  const server = app.listen(config.port, () => {
    logger.info(`🚀 Server is running on port ${config.port}`);
    logger.info(`📝 Environment: ${config.nodeEnv}`);
    logger.info(`💾 Storage driver: ${config.storageDriver}`);
  });

  await bot.initialize();
  scheduler.start();

  // Graceful shutdown
  const gracefulShutdown = (signal: string): void => {
    logger.info(`📊 Received ${signal}. Starting graceful shutdown...`);
    scheduler.stop();

    const closeAll = async (): Promise<void> => {
      await bot.stop();
      if (config.storageDriver === 'postgres') {
        await db.disconnect();
      }
    };

    server.close(() => {
      logger.info('✅ HTTP server closed');
      closeAll()
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error('❌ Error during shutdown', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('❌ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

main().catch((error) => {
  logger.error('❌ Failed to start', { error });
  process.exit(1);
});
