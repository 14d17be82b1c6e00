/**
 * Database models index - exports all model types and interfaces
 */

export * from './BotConfig';
export * from './ConfigTemplate';
export * from './MessageRecord';
export * from './Moderation';

// Common database result types
export interface DatabaseResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  affected_rows?: number;
}
