import {
  ConfigTemplate,
  CreateConfigTemplateData,
  DatabaseResult,
  TemplateFilter,
} from '../models';
import { TemplateStore } from '../stores';

const cloneTemplate = (template: ConfigTemplate): ConfigTemplate => ({
  ...template,
  settings: {
    ...template.settings,
    auto_responses: template.settings.auto_responses?.map((entry) => ({
      ...entry,
    })),
    blocked_words: template.settings.blocked_words && [
      ...template.settings.blocked_words,
    ],
  },
  created_at: new Date(template.created_at),
});

export class MemoryTemplateStore implements TemplateStore {
  private readonly templates = new Map<number, ConfigTemplate>();

  constructor(templates: CreateConfigTemplateData[] = []) {
    this.insertMissing(templates);
  }

  async list(filter: TemplateFilter = {}): Promise<DatabaseResult<ConfigTemplate[]>> {
    const data = [...this.templates.values()]
      .filter(
        (template) =>
          (!filter.platform || template.platform === filter.platform) &&
          (!filter.publicOnly || template.is_public),
      )
      .sort((a, b) => a.template_id - b.template_id)
      .map(cloneTemplate);
    return { success: true, data };
  }

  async findById(templateId: number): Promise<DatabaseResult<ConfigTemplate>> {
    const template = this.templates.get(templateId);
    return { success: true, data: template ? cloneTemplate(template) : undefined };
  }

  async seed(
    templates: CreateConfigTemplateData[],
  ): Promise<DatabaseResult<number>> {
    return { success: true, data: this.insertMissing(templates) };
  }

  private insertMissing(templates: CreateConfigTemplateData[]): number {
    let added = 0;
    for (const template of templates) {
      if (!this.templates.has(template.template_id)) {
        this.templates.set(
          template.template_id,
          cloneTemplate({ ...template, created_at: new Date() }),
        );
        added++;
      }
    }
    return added;
  }
}
