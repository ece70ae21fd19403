import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const packageJsonSchema = z.object({
  name: z.string().default('pocketplan'),
  version: z.string(),
  description: z.string().default(''),
});

const FALLBACK: PackageInfo = { name: 'pocketplan', version: '0.0.0', description: '' };

let cached: PackageInfo | undefined;

/**
 * Read package.json by walking up from this module's directory, so the lookup works from
 * src/ under the test runner and from the bundled dist/ file alike.
 */
export function getPackageInfo(): PackageInfo {
  if (cached) return cached;

  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    let content: unknown = null;
    try {
      content = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8'));
    } catch {
      // not at this level, or unreadable
    }

    const parsed = packageJsonSchema.safeParse(content);
    if (parsed.success) {
      cached = parsed.data;
      return cached;
    }

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return FALLBACK;
}
