#!/usr/bin/env node

/**
 * Подготовка рабочей копии: проверка окружения, каталоги и файл .env
 */

import fs from 'fs/promises';
import path from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger('Setup');

export const REQUIRED_NODE_MAJOR = 20;
export const DIRECTORIES = ['data', 'backups', 'logs'] as const;

export interface SetupOptions {
  rootDir?: string;
  nodeVersion?: string;
  pathEnv?: string;
  print?: (line: string) => void;
}

export type PrerequisiteCheck =
  | { ok: true; messages: string[] }
  | { ok: false; messages: string[]; error: string };

const isExecutable = async (file: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(file);
    return stat.isFile();
  } catch {
    return false;
  }
};

/**
 * Ищет исполняемый файл в каталогах PATH
 */
export async function findOnPath(
  name: string,
  pathEnv: string,
): Promise<string | undefined> {
  const candidates = process.platform === 'win32' ? [`${name}.cmd`, name] : [name];
  for (const dir of pathEnv.split(path.delimiter).filter(Boolean)) {
    for (const candidate of candidates) {
      const file = path.join(dir, candidate);
      if (await isExecutable(file)) {
        return file;
      }
    }
  }
  return undefined;
}

export async function checkPrerequisites(
  nodeVersion: string,
  pathEnv: string,
): Promise<PrerequisiteCheck> {
  const major = Number(nodeVersion.replace(/^v/, '').split('.')[0]);
  if (!Number.isInteger(major) || major < REQUIRED_NODE_MAJOR) {
    return {
      ok: false,
      messages: [],
      error: `❌ Требуется Node.js ${REQUIRED_NODE_MAJOR}+, у вас: ${nodeVersion}`,
    };
  }
  const messages = [`✅ Node.js ${nodeVersion} найден`];

  if (!(await findOnPath('npm', pathEnv))) {
    return {
      ok: false,
      messages,
      error: '❌ npm не найден. Установите npm и попробуйте снова.',
    };
  }
  messages.push('✅ npm найден');

  return { ok: true, messages };
}

export async function createDirectories(rootDir: string): Promise<string[]> {
  const created: string[] = [];
  for (const dir of DIRECTORIES) {
    const target = path.join(rootDir, dir);
    await fs.mkdir(target, { recursive: true });
    created.push(target);
  }
  return created;
}

/**
 * Копирует .env.example в .env, если .env еще нет.
 * Возвращает true, когда файл был создан.
 */
export async function seedEnvFile(rootDir: string): Promise<boolean> {
  const envFile = path.join(rootDir, '.env');
  try {
    await fs.copyFile(
      path.join(rootDir, '.env.example'),
      envFile,
      fs.constants.COPYFILE_EXCL,
    );
    return true;
  } catch (error) {
    // fs errors from another realm (e.g. a test VM) fail instanceof Error
    if (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === 'EEXIST'
    ) {
      return false;
    }
    throw error;
  }
}

/**
 * Возвращает код завершения: 0 при успехе, 1 при отсутствии
 * необходимых компонентов или ошибке.
 */
export async function runSetup(options: SetupOptions = {}): Promise<number> {
  const rootDir = options.rootDir ?? process.cwd();
  const print = options.print ?? ((line: string) => console.log(line));

  print('🚀 Установка Chat Bot Platform...');

  const check = await checkPrerequisites(
    options.nodeVersion ?? process.version,
    options.pathEnv ?? process.env.PATH ?? '',
  );
  check.messages.forEach(print);
  if (!check.ok) {
    print(check.error);
    return 1;
  }

  try {
    print('📁 Создание директорий...');
    await createDirectories(rootDir);

    if (await seedEnvFile(rootDir)) {
      print('⚙️  Создан файл .env');
      print('⚠️  Отредактируйте файл .env и настройте BOT_TOKEN и ADMIN_API_TOKEN');
    } else {
      print('✅ Файл .env уже существует');
    }
  } catch (error) {
    logger.error('Setup failed', { error });
    print(`❌ Ошибка установки: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  print('🎉 Установка завершена успешно!');
  print('Следующие шаги: npm run build && npm start');
  return 0;
}

if (require.main === module) {
  runSetup()
    .then((code) => process.exit(code))
    .catch((error) => {
      logger.error('Setup crashed', { error });
      process.exit(1);
    });
}
