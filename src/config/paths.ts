/**
 * Centralized Path Definitions
 *
 * ~/.grantkb/            (or $GRANTKB_HOME)
 * ├── grantkb.db         (SQLite: projects, chunks, fingerprints, response cache)
 * ├── config.toml        (User configuration)
 * └── projects/          (Default projects_dir)
 *
 * Resolved on every call so GRANTKB_HOME can change between tests.
 */

import { join, isAbsolute, resolve } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export function getGrantKbDir(): string {
  const override = getEnv('GRANTKB_HOME');
  return override ? resolve(override) : join(homedir(), '.grantkb');
}

export function getDbPath(): string {
  return join(getGrantKbDir(), 'grantkb.db');
}

export function getConfigPath(): string {
  return join(getGrantKbDir(), 'config.toml');
}

/**
 * Resolve the configured projects_dir: `~` expands to the home directory,
 * relative paths resolve against the grantkb directory.
 */
export function resolveProjectsDir(projectsDir: string): string {
  if (projectsDir === '~' || projectsDir.startsWith('~/')) {
    return join(homedir(), projectsDir.slice(1));
  }
  return isAbsolute(projectsDir) ? projectsDir : join(getGrantKbDir(), projectsDir);
}
