import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string): Ora {
  return ora({ text, spinner: 'dots', stream: process.stderr });
}

/** Run `fn` under a spinner; `enabled: false` runs it silently (JSON output, piped stdout). */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  options: { enabled?: boolean } = {},
): Promise<T> {
  if (options.enabled === false) {
    return fn();
  }

  const spinner = createSpinner(text);
  spinner.start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
