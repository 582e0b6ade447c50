/**
 * Command context construction and shared helpers for command handlers.
 */

import chalk from 'chalk';

import { loadConfig } from '../config/index.js';
import { ValidationError } from '../errors/index.js';
import { createKnowledgeBase, type KnowledgeBase } from '../knowledge-base/index.js';
import type { Logger } from '../utils/index.js';
import type { CommandContext, GlobalOptions } from './types.js';

export type KnowledgeBaseFactory = (logger: Logger) => KnowledgeBase;

const openFromConfig: KnowledgeBaseFactory = (logger) => createKnowledgeBase(loadConfig(), { logger });

/**
 * Create a command context with logging utilities.
 * Everything human-readable is suppressed under --json so stdout stays parseable.
 */
export function createContext(
  options: GlobalOptions,
  open: KnowledgeBaseFactory = openFromConfig
): CommandContext {
  const ctx: CommandContext = {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
    openKnowledgeBase: () => open(ctx),
  };
  return ctx;
}

/**
 * Open the knowledge base for one command and close it afterwards,
 * whether the command succeeds or throws.
 */
export async function withKnowledgeBase<T>(
  ctx: CommandContext,
  fn: (kb: KnowledgeBase) => Promise<T> | T
): Promise<T> {
  const kb = ctx.openKnowledgeBase();
  try {
    return await fn(kb);
  } finally {
    kb.close();
  }
}

/**
 * Parse the --top-k option. Absent means "use search.top_k from config".
 *
 * @throws ValidationError for anything but a positive integer up to 100
 */
export function parseTopK(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const topK = Number(value);
  if (!Number.isInteger(topK) || topK < 1 || topK > 100) {
    throw new ValidationError(`Invalid --top-k value: ${value}`, ['Must be an integer between 1 and 100']);
  }
  return topK;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
