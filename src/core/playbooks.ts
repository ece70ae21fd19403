import { spawn } from 'node:child_process';
import chalk from 'chalk';

export interface PlaybookOptions {
  parallel?: boolean;
  /** Pool size in parallel mode; defaults to one worker per command. */
  maxWorkers?: number;
  cwd?: string;
}

export const SPAWN_FAILURE_EXIT_CODE = 127;

function runCommand(command: string, cwd: string | undefined): Promise<number> {
  return new Promise((resolve) => {
    const child = spawn(command, {
      cwd,
      shell: true,
      stdio: 'inherit',
      env: { ...process.env },
    });

    child.on('error', (err) => {
      console.error(chalk.red(`Failed to start "${command}": ${err.message}`));
      resolve(SPAWN_FAILURE_EXIT_CODE);
    });

    child.on('close', (code) => {
      // null means the process was killed by a signal
      resolve(code ?? 1);
    });
  });
}

/**
 * Run playbook commands through the shell and return the aggregate exit code.
 *
 * Sequential mode stops at the first failing command. Parallel mode runs every command on a
 * bounded pool and reports the first failure observed, in completion order.
 */
export async function executePlaybook(
  commands: readonly string[],
  options: PlaybookOptions = {},
): Promise<number> {
  if (commands.length === 0) {
    return 0;
  }

  if (!options.parallel) {
    for (const command of commands) {
      console.log(chalk.dim(`$ ${command}`));
      const code = await runCommand(command, options.cwd);
      if (code !== 0) {
        console.log(chalk.red(`Command failed with exit code ${code}`));
        return code;
      }
    }
    return 0;
  }

  const workers = Math.max(1, Math.min(options.maxWorkers ?? commands.length, commands.length));
  const results: number[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < commands.length) {
      const command = commands[next++];
      const code = await runCommand(command, options.cwd);
      results.push(code);
      const status = code === 0 ? chalk.green('succeeded') : chalk.red(`failed (${code})`);
      console.log(`[parallel] ${command} -> ${status}`);
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));

  return results.find((code) => code !== 0) ?? 0;
}
