import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

export interface LoadEnvOptions {
  /** Directories up from the calling module to the package root (default: 1 for src/index.ts) */
  levelsUp?: number;
  /** File name to look for in the package root (default: .env) */
  fileName?: string;
}

/**
 * Safely load .env from the package root. Prevents dotenv v17 from writing
 * debug output to stdout, which corrupts MCP stdio transport.
 * Variables already present in the environment are never overridden.
 *
 * @param importMetaUrl - pass `import.meta.url` from the entry point
 * @returns the path that was loaded, or null when no file exists
 */
export function loadEnvSafely(importMetaUrl: string, options: LoadEnvOptions = {}): string | null {
  const { levelsUp = 1, fileName = '.env' } = options;
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, fileName);
  if (!existsSync(envPath)) {
    return null;
  }
  dotenvConfig({ path: envPath, quiet: true });
  return envPath;
}
