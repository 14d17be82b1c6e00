/**
 * TemplateDAO - Data Access Object for configuration templates
 */

import { db } from '../connection';
import {
  ConfigTemplate,
  CreateConfigTemplateData,
  DatabaseResult,
  TemplateFilter,
  TemplateSettings,
} from '../models';
import { TemplateStore } from '../stores';
import { createLogger, Logger } from '../../utils/logger';
import { templateSettingsSchema } from '../../utils/validation';

export type ConfigTemplateRow = {
  template_id: number;
  name: string;
  description: string | null;
  platform: string;
  settings: unknown;
  is_public: boolean;
  created_at: Date;
};

const parseSettings = (value: unknown): TemplateSettings => {
  const parsed = templateSettingsSchema.safeParse(
    typeof value === 'string' ? JSON.parse(value) : value,
  );
  return parsed.success ? parsed.data : {};
};

export class TemplateDAO implements TemplateStore {
  private logger: Logger;

  constructor() {
    this.logger = createLogger('TemplateDAO');
  }

  parseRow(row: ConfigTemplateRow): ConfigTemplate {
    return {
      template_id: Number(row.template_id),
      name: row.name,
      description: row.description ?? undefined,
      platform: row.platform,
      settings: parseSettings(row.settings),
      is_public: Boolean(row.is_public),
      created_at: new Date(row.created_at),
    };
  }

  /**
   * Получает шаблоны с фильтрацией по платформе и публичности
   */
  async list(filter: TemplateFilter = {}): Promise<DatabaseResult<ConfigTemplate[]>> {
    try {
      const conditions: string[] = [];
      const params: unknown[] = [];

      if (filter.platform) {
        params.push(filter.platform);
        conditions.push(`platform = $${params.length}`);
      }
      if (filter.publicOnly) {
        conditions.push('is_public = TRUE');
      }

      const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
      const result = await db.query<ConfigTemplateRow>(
        `SELECT * FROM config_templates ${where} ORDER BY template_id ASC`,
        params,
      );

      return {
        success: true,
        data: result.rows.map((row) => this.parseRow(row)),
      };
    } catch (error) {
      this.logger.error('Failed to list templates', { filter, error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  async findById(templateId: number): Promise<DatabaseResult<ConfigTemplate>> {
    try {
      const result = await db.query<ConfigTemplateRow>(
        'SELECT * FROM config_templates WHERE template_id = $1',
        [templateId],
      );
      const row = result.rows[0];
      return { success: true, data: row ? this.parseRow(row) : undefined };
    } catch (error) {
      this.logger.error('Failed to load template', { templateId, error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Добавляет отсутствующие шаблоны; сохраненные не перезаписываются
   */
  async seed(
    templates: CreateConfigTemplateData[],
  ): Promise<DatabaseResult<number>> {
    try {
      const added = await db.transaction(async (query) => {
        let inserted = 0;
        for (const template of templates) {
          const result = await query(
            `INSERT INTO config_templates (template_id, name, description, platform, settings, is_public)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (template_id) DO NOTHING`,
            [
              template.template_id,
              template.name,
              template.description ?? null,
              template.platform,
              JSON.stringify(template.settings),
              template.is_public,
            ],
          );
          inserted += result.rowCount ?? 0;
        }
        return inserted;
      });

      return { success: true, data: added, affected_rows: added };
    } catch (error) {
      this.logger.error('Failed to seed templates', { error });
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}

export const templateDAO = new TemplateDAO();
