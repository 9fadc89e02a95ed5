/**
 * Load the project-root .env file from any workspace package
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Walk up from `startPath` until a directory containing `.env` is found
 */
function findEnvRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    if (existsSync(join(current, '.env'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load environment variables from the nearest .env above this module,
 * falling back to the working directory. Returns the file that was used.
 */
export function loadEnvFromRoot(): string | null {
  const here = dirname(fileURLToPath(import.meta.url));
  const projectRoot = findEnvRoot(here) ?? findEnvRoot(process.cwd());

  if (!projectRoot) {
    dotenv.config();
    return null;
  }

  const envPath = join(projectRoot, '.env');
  dotenv.config({ path: envPath });
  return envPath;
}
