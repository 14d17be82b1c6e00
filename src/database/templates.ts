import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CreateConfigTemplateData } from './models';
import { configTemplateSchema, parseOrThrow } from '../utils/validation';

export const DEFAULT_TEMPLATES_FILE = path.resolve(
  __dirname,
  '../../database/templates.json',
);

/**
 * Reads and validates the built-in configuration templates
 */
export async function loadTemplates(
  file: string = DEFAULT_TEMPLATES_FILE,
): Promise<CreateConfigTemplateData[]> {
  const raw = await fs.readFile(file, 'utf8');
  return parseOrThrow(z.array(configTemplateSchema), JSON.parse(raw));
}
