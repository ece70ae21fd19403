import { InvalidArgumentError } from 'commander';

import { InvalidOptionError } from './errors.js';

/** Split a `key=value` flag. The value may itself contain `=`. */
export function parseOptionPair(raw: string): [string, string] {
  const index = raw.indexOf('=');
  if (index <= 0) {
    throw new InvalidOptionError(raw);
  }
  const key = raw.slice(0, index).trim();
  if (!key) {
    throw new InvalidOptionError(raw);
  }
  return [key, raw.slice(index + 1).trim()];
}

export function parseOptionPairs(values: readonly string[]): Record<string, string> {
  const options: Record<string, string> = {};
  for (const value of values) {
    const [key, parsed] = parseOptionPair(value);
    options[key] = parsed;
  }
  return options;
}

/** commander collector for repeatable `--option key=value` flags. */
export function collectOption(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
