/**
 * Error formatting and display for the grantkb CLI
 *
 * - Coloured output for terminals
 * - JSON output for scripts (--json)
 * - Stack traces with --verbose
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  /** Error class name, e.g. "EmbeddingServiceError" */
  kind: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (!(error instanceof Error)) {
    if (json) {
      return JSON.stringify({ error: String(error), kind: 'unknown', code: 1 }, null, 2);
    }
    return chalk.red('Error: ') + String(error);
  }

  const hint =
    error instanceof CLIError ? error.hint : 'Run with --verbose for more details';

  if (json) {
    const output: ErrorOutput = {
      error: error.message,
      kind: error.name,
      code: getExitCode(error),
      hint: error instanceof CLIError ? error.hint : undefined,
      stack: verbose ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + error.message];

  // Plain errors only get the --verbose nudge when we aren't already verbose
  if (hint && (error instanceof CLIError || !verbose)) {
    lines.push(chalk.dim('Hint: ') + hint);
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(error.stack));
  }

  return lines.join('\n');
}

/**
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level events:
 *
 *   process.on('uncaughtException', createGlobalErrorHandler({ verbose }));
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
