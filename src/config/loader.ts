/**
 * Configuration Loader
 *
 * 1. Find/create the grantkb directory
 * 2. Load config.toml if it exists
 * 3. Validate with the Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Check cross-field rules on the merged result
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import {
  PartialConfigSchema,
  ValidatedConfigSchema,
  type Config,
  type PartialConfig,
} from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigurationError } from '../errors/index.js';

export interface LoadConfigOptions {
  /** Defaults to ~/.grantkb/config.toml */
  configPath?: string;
  /** Write the commented template on first run (default: true) */
  createIfMissing?: boolean;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Section-wise merge; arrays from the user replace the defaults.
 */
export function mergeConfig(base: Config, user: PartialConfig): Config {
  return {
    projects_dir: user.projects_dir ?? base.projects_dir,
    embedding: { ...base.embedding, ...user.embedding },
    generation: { ...base.generation, ...user.generation },
    chunking: { ...base.chunking, ...user.chunking },
    search: { ...base.search, ...user.search },
    ingestion: {
      ...base.ingestion,
      ...user.ingestion,
      ignore_patterns: user.ingestion?.ignore_patterns ?? base.ingestion.ignore_patterns,
    },
  };
}

/**
 * Validate a complete config, e.g. one built in code rather than read
 * from disk.
 *
 * @throws ConfigurationError listing every offending key
 */
export function validateConfig(config: Config, source = 'configuration'): Config {
  const result = ValidatedConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Load, merge and validate the config file.
 *
 * @throws ConfigurationError if the file exists but is malformed or out of range
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.configPath ?? getConfigPath();
  const createIfMissing = options.createIfMissing ?? true;

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigurationError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    throw new ConfigurationError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      `Fix the listed keys in ${configPath}`
    );
  }

  return validateConfig(mergeConfig(DEFAULT_CONFIG, validationResult.data), `configuration in ${configPath}`);
}
