/**
 * MaintenanceScheduler - periodic cleanup of expired warning counters
 */

import cron, { ScheduledTask } from 'node-cron';
import { ModerationService } from '../services/ModerationService';
import { createLogger, Logger } from '../utils/logger';

export interface MaintenanceOptions {
  cronTime: string;
  warningTtlHours: number;
}

export class MaintenanceScheduler {
  private readonly logger: Logger;
  private task?: ScheduledTask;

  constructor(
    private readonly moderation: ModerationService,
    private readonly options: MaintenanceOptions,
  ) {
    this.logger = createLogger('MaintenanceScheduler');
  }

  start(): void {
    if (this.task) {
      return;
    }
    this.logger.info(`Maintenance will run on schedule ${this.options.cronTime}`);
    this.task = cron.schedule(this.options.cronTime, () => {
      this.runOnce().catch((error) => {
        this.logger.error('Maintenance run failed', { error });
      });
    });
  }

  /**
   * Purges warnings older than the configured TTL; returns how many
   */
  async runOnce(now: Date = new Date()): Promise<number> {
    this.logger.info('Starting maintenance run...');
    return this.moderation.purgeExpiredWarnings(this.options.warningTtlHours, now);
  }

  stop(): void {
    this.task?.stop();
    this.task = undefined;
  }

  isRunning(): boolean {
    return this.task !== undefined;
  }
}
