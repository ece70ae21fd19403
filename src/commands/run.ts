import { resolve } from 'node:path';

import { requireConfig } from '../core/config.js';
import { executePlaybook } from '../core/playbooks.js';
import { logger } from '../ui/logger.js';
import { PlaybookNotFoundError } from '../utils/errors.js';

export interface RunOptions {
  config?: string;
  dryRun?: boolean;
  parallel?: boolean;
  maxWorkers?: number;
}

export async function runCommand(playbook: string, options: RunOptions): Promise<void> {
  const directory = options.config ?? process.cwd();
  const config = await requireConfig(directory);

  if (!Object.hasOwn(config.playbooks, playbook)) {
    throw new PlaybookNotFoundError(playbook, Object.keys(config.playbooks));
  }
  const commands = config.playbooks[playbook];

  if (options.dryRun) {
    logger.info('Dry run – commands to execute:');
    for (const command of commands) {
      logger.plain(` - ${command}`);
    }
    return;
  }

  logger.header(`Running playbook: ${playbook}`);
  const code = await executePlaybook(commands, {
    parallel: options.parallel,
    maxWorkers: options.maxWorkers,
    cwd: resolve(directory),
  });

  if (code !== 0) {
    logger.error(`Playbook '${playbook}' failed with exit code ${code}`);
    process.exitCode = code;
    return;
  }
  logger.success(`Playbook '${playbook}' completed`);
}
