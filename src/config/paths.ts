/**
 * Centralized Path Definitions
 *
 * ~/.docent/
 * ├── docent.db    (SQLite vector store)
 * ├── config.toml  (User configuration)
 * └── .env         (API keys, optional)
 *
 * DOCENT_HOME relocates the whole directory.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the docent directory path (~/.docent, or $DOCENT_HOME)
 */
export function getDocentDir(): string {
  return process.env.DOCENT_HOME ?? join(homedir(), '.docent');
}

export function getDbPath(): string {
  return join(getDocentDir(), 'docent.db');
}

export function getConfigPath(): string {
  return join(getDocentDir(), 'config.toml');
}

export function getEnvFilePath(): string {
  return join(getDocentDir(), '.env');
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
