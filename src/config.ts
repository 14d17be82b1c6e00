import dotenv from 'dotenv';
import cron from 'node-cron';
import { z } from 'zod';
import { LOG_LEVELS, LogLevel } from './utils/logger';

dotenv.config();

const positiveIdList = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? '')
      .split(',')
      .map((value) => Number(value.trim()))
      .filter((value) => Number.isInteger(value) && value > 0),
  );

// AD_PATTERNS holds a JSON array of regular expression sources
const adPatterns = z
  .string()
  .optional()
  .transform((raw, ctx): RegExp[] => {
    if (!raw || raw.trim().length === 0) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'AD_PATTERNS must be a JSON array of strings',
      });
      return z.NEVER;
    }

    const sources = z.array(z.string().min(2)).safeParse(parsed);
    if (!sources.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'AD_PATTERNS must be a JSON array of strings',
      });
      return z.NEVER;
    }

    const patterns: RegExp[] = [];
    for (const source of sources.data) {
      try {
        patterns.push(new RegExp(source, 'iu'));
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `AD_PATTERNS contains an invalid expression: ${source}`,
        });
        return z.NEVER;
      }
    }
    return patterns;
  });

const envSchema = z
  .object({
    BOT_ID: z.coerce.number().int().positive().default(1),
    BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is missing'),
    WEBHOOK_URL: z
      .string()
      .url()
      .optional()
      .or(z.literal('').transform(() => undefined)),
    // Sent by Telegram in X-Telegram-Bot-Api-Secret-Token
    WEBHOOK_SECRET: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, {
        message: 'WEBHOOK_SECRET may contain only A-Z, a-z, 0-9, _ and -',
      })
      .optional()
      .or(z.literal('').transform(() => undefined)),
    ADMIN_USER_IDS: positiveIdList,
    PORT: z.coerce.number().int().positive().default(3000),
    ADMIN_API_TOKEN: z.string().min(1, 'ADMIN_API_TOKEN is missing'),
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    WARNING_TTL_HOURS: z.coerce.number().int().positive().default(336),
    MAINTENANCE_CRON: z
      .string()
      .default('0 * * * *')
      .refine((expression) => cron.validate(expression), {
        message: 'MAINTENANCE_CRON is not a valid cron expression',
      }),
    AD_PATTERNS: adPatterns,
  })
  .refine((env) => env.NODE_ENV !== 'production' || env.WEBHOOK_URL, {
    message: 'WEBHOOK_URL is required in production environment',
    path: ['WEBHOOK_URL'],
  })
  .refine((env) => !env.WEBHOOK_URL || env.WEBHOOK_SECRET, {
    message: 'WEBHOOK_SECRET is required when WEBHOOK_URL is set',
    path: ['WEBHOOK_SECRET'],
  });

export interface AppConfig {
  botId: number;
  botToken: string;
  webhookUrl?: string;
  webhookSecret?: string;
  adminUserIds: Set<number>;
  port: number;
  adminApiToken: string;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  storageDriver: 'memory' | 'postgres';
  warningTtlHours: number;
  maintenanceCron: string;
  adPatterns: RegExp[];
}

/**
 * Reads and validates the process environment. Throws with every
 * problem listed so start-up fails once with the full picture.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    botId: parsed.BOT_ID,
    botToken: parsed.BOT_TOKEN,
    webhookUrl: parsed.WEBHOOK_URL,
    webhookSecret: parsed.WEBHOOK_SECRET,
    adminUserIds: new Set(parsed.ADMIN_USER_IDS),
    port: parsed.PORT,
    adminApiToken: parsed.ADMIN_API_TOKEN,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    storageDriver: parsed.STORAGE_DRIVER,
    warningTtlHours: parsed.WARNING_TTL_HOURS,
    maintenanceCron: parsed.MAINTENANCE_CRON,
    adPatterns: parsed.AD_PATTERNS,
  };
}
