import { requireConfig, saveConfig } from '../core/config.js';
import { logger } from '../ui/logger.js';
import { PlaybookNotFoundError } from '../utils/errors.js';

export interface PlaybookEditOptions {
  config?: string;
}

export async function addPlaybookCommand(
  name: string,
  commands: string[],
  options: PlaybookEditOptions,
): Promise<void> {
  const config = await requireConfig(options.config ?? process.cwd());
  const replacing = Object.hasOwn(config.playbooks, name);
  config.playbooks = { ...config.playbooks, [name]: commands };
  await saveConfig(config);
  logger.success(`${replacing ? 'Updated' : 'Added'} playbook '${name}' (${commands.length} commands)`);
}

export async function removePlaybookCommand(
  name: string,
  options: PlaybookEditOptions,
): Promise<void> {
  const config = await requireConfig(options.config ?? process.cwd());
  if (!Object.hasOwn(config.playbooks, name)) {
    throw new PlaybookNotFoundError(name, Object.keys(config.playbooks));
  }
  const { [name]: _removed, ...rest } = config.playbooks;
  config.playbooks = rest;
  await saveConfig(config);
  logger.success(`Removed playbook '${name}'`);
}
