import { CONFIG_FILENAME, configPath, initializeConfig } from '../core/config.js';
import { logger } from '../ui/logger.js';
import { confirmPrompt, isInteractive } from '../ui/prompts.js';
import { fileExists } from '../utils/fs.js';

export interface InitOptions {
  config?: string;
  overwrite?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const directory = options.config ?? process.cwd();
  let overwrite = options.overwrite ?? false;

  if (!overwrite && isInteractive() && (await fileExists(configPath(directory)))) {
    overwrite = await confirmPrompt(`${CONFIG_FILENAME} already exists. Overwrite it?`, false);
    if (!overwrite) {
      logger.info('Aborted. Existing configuration left untouched.');
      return;
    }
  }

  const config = await initializeConfig(directory, { overwrite });
  logger.success(`Initialized configuration at ${config.path}`);
  logger.info(`Workspace directory: ${config.workspace}`);
}
