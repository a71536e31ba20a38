// shared/paths.ts — Locate files shipped beside the sources

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Walks up from this module until `relative` exists. Works from src/ under
 * the test runner and from dist/src/ after a build.
 */
export function findProjectPath(relative: string): string {
  let dir = moduleDir;
  for (;;) {
    const candidate = join(dir, relative);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  throw new Error(`Could not locate ${relative} above ${resolve(moduleDir)}`);
}
