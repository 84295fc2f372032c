import { readdirSync } from 'node:fs';
import { join } from 'node:path';

/** Every `*.test.ts` under `<root>/src`, relative to `root`, sorted. */
export function findTestFiles(root: string): string[] {
  return readdirSync(join(root, 'src'), { recursive: true, encoding: 'utf8' })
    .filter((file) => file.endsWith('.test.ts'))
    .map((file) => join('src', file))
    .sort();
}
