import { program } from './cli.js';
import { logger } from './ui/logger.js';
import { UserCancelledError } from './utils/errors.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof UserCancelledError) {
    logger.dim(error.message);
    process.exitCode = 130;
    return;
  }
  logger.error(error instanceof Error ? error.message : String(error));
  logger.debug(error instanceof Error ? (error.stack ?? '') : '');
  process.exitCode = 1;
});
