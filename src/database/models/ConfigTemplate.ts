/**
 * ConfigTemplate model - reusable starting settings for a chat
 */

import { AutoResponse } from './BotConfig';

export interface TemplateSettings {
  welcome_message?: string;
  auto_responses?: AutoResponse[];
  blocked_words?: string[];
}

export interface ConfigTemplate {
  template_id: number;
  name: string;
  description?: string;
  platform: string;
  settings: TemplateSettings;
  is_public: boolean;
  created_at: Date;
}

export type CreateConfigTemplateData = Omit<ConfigTemplate, 'created_at'>;

export interface TemplateFilter {
  platform?: string;
  publicOnly?: boolean;
}
