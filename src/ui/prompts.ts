import { confirm, input } from '@inquirer/prompts';

import { UserCancelledError } from '../utils/errors.js';

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

async function cancellable<T>(prompt: () => Promise<T>): Promise<T> {
  try {
    return await prompt();
  } catch (error) {
    // @inquirer/prompts rejects with ExitPromptError on Ctrl+C
    if (error instanceof Error && error.name === 'ExitPromptError') {
      throw new UserCancelledError();
    }
    throw error;
  }
}

export async function confirmPrompt(message: string, defaultValue = true): Promise<boolean> {
  return cancellable(() => confirm({ message, default: defaultValue }));
}

export async function inputPrompt(message: string, defaultValue?: string): Promise<string> {
  return cancellable(() => input({ message, default: defaultValue }));
}
