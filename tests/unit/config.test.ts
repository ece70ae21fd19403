import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  configPath,
  initializeConfig,
  loadConfig,
  requireConfig,
  saveConfig,
} from '../../src/core/config.js';
import {
  ConfigExistsError,
  ConfigInvalidError,
  ConfigNotFoundError,
} from '../../src/utils/errors.js';

describe('config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pocketplan-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null when no file exists', async () => {
    expect(await loadConfig(dir)).toBeNull();
  });

  it('throws ConfigNotFoundError from requireConfig', async () => {
    await expect(requireConfig(dir)).rejects.toThrow(ConfigNotFoundError);
  });

  it('initializes the defaults and the workspace directory', async () => {
    const config = await initializeConfig(dir);

    expect(config).toEqual({ ...DEFAULT_CONFIG, path: join(dir, CONFIG_FILENAME) });
    expect((await stat(join(dir, 'workspace'))).isDirectory()).toBe(true);

    const raw = await readFile(configPath(dir), 'utf-8');
    expect(raw).toBe(JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n');
  });

  it('refuses to overwrite without the flag', async () => {
    await initializeConfig(dir);
    await expect(initializeConfig(dir)).rejects.toThrow(ConfigExistsError);
  });

  it('overwrites when asked', async () => {
    await writeFile(configPath(dir), JSON.stringify({ profile: 'old' }), 'utf-8');

    const config = await initializeConfig(dir, { overwrite: true });
    expect(config.profile).toBe('default');
  });

  it('fills in defaults for a partial file', async () => {
    await writeFile(configPath(dir), JSON.stringify({ profile: 'phone' }), 'utf-8');

    const config = await requireConfig(dir);
    expect(config.profile).toBe('phone');
    expect(config.workspace).toBe('workspace');
    expect(config.playbooks).toEqual({});
    expect(config.llm.provider).toBe('heuristic');
    expect(config.llm.options).toEqual({});
  });

  it('saves changes back to the same file', async () => {
    const config = await initializeConfig(dir);
    config.profile = 'termux';
    config.playbooks = { ...config.playbooks, lint: ['npm run lint'] };
    config.llm = { ...config.llm, provider: 'ollama', model: 'llama3' };
    await saveConfig(config);

    const reloaded = await requireConfig(dir);
    expect(reloaded.profile).toBe('termux');
    expect(reloaded.playbooks.lint).toEqual(['npm run lint']);
    expect(reloaded.llm.provider).toBe('ollama');
    expect(reloaded.llm.model).toBe('llama3');

    const raw = JSON.parse(await readFile(configPath(dir), 'utf-8')) as Record<string, unknown>;
    expect(raw).not.toHaveProperty('path');
  });

  it('rejects malformed JSON', async () => {
    await writeFile(configPath(dir), '{ not json', 'utf-8');
    await expect(loadConfig(dir)).rejects.toThrow(ConfigInvalidError);
  });

  it('rejects playbooks that are not command lists', async () => {
    await writeFile(configPath(dir), JSON.stringify({ playbooks: { x: 'echo hi' } }), 'utf-8');
    await expect(loadConfig(dir)).rejects.toThrow(
      `${CONFIG_FILENAME} is invalid: playbooks.x: Expected array, received string`,
    );
  });
});
