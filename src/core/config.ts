import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { z } from 'zod';

import { fileExists, readFileIfExists } from '../utils/fs.js';
import { ConfigExistsError, ConfigInvalidError, ConfigNotFoundError } from '../utils/errors.js';

export const CONFIG_FILENAME = '.pocketplan.json';

const llmConfigSchema = z.object({
  provider: z.string().default('heuristic'),
  model: z.string().nullish(),
  api_base: z.string().nullish(),
  api_key_env: z.string().nullish(),
  options: z.record(z.string()).default({}),
});

const configRecordSchema = z.object({
  profile: z.string().default('default'),
  workspace: z.string().default('workspace'),
  playbooks: z.record(z.array(z.string())).default({}),
  llm: llmConfigSchema.default({}),
});

export type LlmConfig = z.infer<typeof llmConfigSchema>;
export type ConfigRecord = z.infer<typeof configRecordSchema>;

export interface AppConfig extends ConfigRecord {
  /** Absolute path of the backing file. */
  path: string;
}

export const DEFAULT_CONFIG: ConfigRecord = {
  profile: 'default',
  workspace: 'workspace',
  playbooks: {
    'bootstrap-termux': ['pkg update -y', 'pkg install -y git nodejs'],
    'run-tests': ['npm test'],
  },
  llm: {
    provider: 'heuristic',
    model: null,
    api_base: null,
    api_key_env: null,
    options: {},
  },
};

export function configPath(directory: string): string {
  return resolve(join(directory, CONFIG_FILENAME));
}

export async function loadConfig(directory: string): Promise<AppConfig | null> {
  const path = configPath(directory);
  const raw = await readFileIfExists(path);
  if (raw === null) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigInvalidError(
      `${CONFIG_FILENAME} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = configRecordSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigInvalidError(`${CONFIG_FILENAME} is invalid: ${issues}`);
  }

  return { ...parsed.data, path };
}

export async function requireConfig(directory: string): Promise<AppConfig> {
  const config = await loadConfig(directory);
  if (!config) {
    throw new ConfigNotFoundError(directory, CONFIG_FILENAME);
  }
  return config;
}

export async function initializeConfig(
  directory: string,
  options: { overwrite?: boolean } = {},
): Promise<AppConfig> {
  const path = configPath(directory);
  if ((await fileExists(path)) && !options.overwrite) {
    throw new ConfigExistsError(CONFIG_FILENAME);
  }

  await mkdir(directory, { recursive: true });
  await writeFile(path, serialize(DEFAULT_CONFIG), 'utf-8');
  await mkdir(join(directory, DEFAULT_CONFIG.workspace), { recursive: true });
  return requireConfig(directory);
}

export async function saveConfig(config: AppConfig): Promise<void> {
  const { path, ...record } = config;
  await writeFile(path, serialize(record), 'utf-8');
}

function serialize(record: ConfigRecord): string {
  return JSON.stringify(record, null, 2) + '\n';
}
