import { requireConfig } from '../core/config.js';
import { isConstrainedEnvironment } from '../core/environment.js';
import { logger } from '../ui/logger.js';

export interface ShowOptions {
  config?: string;
  playbooks?: boolean;
}

export async function showCommand(options: ShowOptions): Promise<void> {
  const config = await requireConfig(options.config ?? process.cwd());

  logger.field('Configuration path', config.path);
  logger.field('Profile', config.profile);
  logger.field('Workspace', config.workspace);
  const { provider, model } = config.llm;
  logger.field('Provider', model ? `${provider} (${model})` : provider);
  logger.field('Detected Termux', isConstrainedEnvironment() ? 'yes' : 'no');

  if (options.playbooks) {
    logger.header('Playbooks:');
    const names = Object.keys(config.playbooks).sort();
    if (names.length === 0) {
      logger.dim(' (none)');
    }
    for (const name of names) {
      logger.plain(` - ${name}: ${config.playbooks[name].join(', ')}`);
    }
  }
}
