/**
 * Validation schemas for chat configuration data
 */

import { z } from 'zod';
import { ValidationError } from '../middleware/errorHandler';

export const botIdSchema = z.coerce
  .number()
  .int()
  .positive({ message: 'Bot ID must be a positive integer' });

export const chatIdSchema = z
  .string()
  .trim()
  .min(1, { message: 'Chat ID is required' })
  .max(100, { message: 'Chat ID cannot exceed 100 characters' });

export const triggerSchema = z
  .string()
  .trim()
  .min(1, { message: 'Trigger cannot be empty' })
  .max(200, { message: 'Trigger cannot exceed 200 characters' });

export const replySchema = z
  .string()
  .trim()
  .min(1, { message: 'Reply cannot be empty' })
  .max(4096, { message: 'Reply cannot exceed 4096 characters' });

export const blockedWordSchema = z
  .string()
  .trim()
  .min(2, { message: 'Blocked word must be at least 2 characters long' })
  .max(100, { message: 'Blocked word cannot exceed 100 characters' });

// Telegram command names: lowercase latin letters, digits, underscores
export const commandNameSchema = z
  .string()
  .trim()
  .regex(/^[a-z0-9_]{1,32}$/, {
    message:
      'Command name must be 1-32 characters long and contain only lowercase letters, numbers, and underscores',
  });

export const commandDescriptionSchema = z
  .string()
  .trim()
  .min(1, { message: 'Command description cannot be empty' })
  .max(256, { message: 'Command description cannot exceed 256 characters' });

export const thresholdSchema = z
  .number()
  .int({ message: 'Value must be an integer' })
  .nonnegative({ message: 'Value cannot be negative' });

// Telegram treats restrictions shorter than 30 seconds or longer than
// 366 days as permanent
export const MIN_MUTE_SECONDS = 30;
export const MAX_MUTE_SECONDS = 366 * 24 * 60 * 60;

export const muteDurationSchema = thresholdSchema.refine(
  (seconds) =>
    seconds === 0 || (seconds >= MIN_MUTE_SECONDS && seconds <= MAX_MUTE_SECONDS),
  {
    message: `Mute duration must be 0 or between ${MIN_MUTE_SECONDS} and ${MAX_MUTE_SECONDS} seconds`,
  },
);

export const autoResponseSchema = z.object({
  trigger: triggerSchema,
  reply: replySchema,
});

export const updateBotConfigSchema = z
  .object({
    chat_name: z.string().trim().max(200).optional(),
    welcome_message: z.string().trim().max(4096).optional(),
    auto_responses: z.array(autoResponseSchema).max(500).optional(),
    blocked_words: z.array(blockedWordSchema).max(1000).optional(),
    commands: z.record(commandNameSchema, commandDescriptionSchema).optional(),
    warn_threshold: thresholdSchema.optional(),
    mute_duration: muteDurationSchema.optional(),
    max_message_length: thresholdSchema.optional(),
  })
  .strict();

export const thresholdNameSchema = z.enum([
  'warn_threshold',
  'mute_duration',
  'max_message_length',
]);

export const statsDaysSchema = z.coerce.number().int().min(1).max(365).default(7);

export const templateIdSchema = z.coerce
  .number()
  .int()
  .positive({ message: 'Template ID must be a positive integer' });

export const platformSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(1, { message: 'Platform is required' })
  .max(50, { message: 'Platform cannot exceed 50 characters' });

export const templateSettingsSchema = z.object({
  welcome_message: z.string().trim().max(4096).optional(),
  auto_responses: z.array(autoResponseSchema).max(500).optional(),
  blocked_words: z.array(blockedWordSchema).max(1000).optional(),
});

export const configTemplateSchema = z.object({
  template_id: z.number().int().positive(),
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().max(1000).optional(),
  platform: platformSchema,
  settings: templateSettingsSchema,
  is_public: z.boolean().default(true),
});

export type UpdateBotConfigInput = z.infer<typeof updateBotConfigSchema>;
export type ThresholdName = z.infer<typeof thresholdNameSchema>;

/**
 * Returns the first zod issue message, for replies shown in chats
 */
export const firstIssue = (error: z.ZodError): string =>
  error.errors[0]?.message || 'Validation failed';

export const parseOrThrow = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(firstIssue(result.error), result.error.errors);
  }
  return result.data;
};
