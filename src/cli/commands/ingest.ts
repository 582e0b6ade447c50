/**
 * Ingest Command
 *
 * Brings a project's vectors in line with its document folder:
 *   grantkb ingest alpha                 projects_dir/alpha
 *   grantkb ingest alpha --path ./docs   explicit folder (remembered)
 *   grantkb ingest --all                 every sub-folder of projects_dir
 *   grantkb ingest alpha --force         drop everything and re-embed
 *
 * Ctrl-C aborts the run; documents already committed stay valid.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type { CommandContext } from '../types.js';
import { printJson, withKnowledgeBase } from '../context.js';
import { pluralize } from '../format.js';
import { ValidationError } from '../../errors/index.js';
import type { IngestOptions, IngestionSummary, ProjectIngestionResult } from '../../indexer/index.js';

interface IngestCommandOptions {
  all?: boolean;
  path?: string;
  force?: boolean;
}

export function formatSummary(summary: IngestionSummary): string[] {
  const counts = [
    `${summary.documentsAdded} added`,
    `${summary.documentsUpdated} updated`,
    `${summary.documentsRemoved} removed`,
    `${summary.documentsUnchanged} unchanged`,
  ].join(', ');
  const lines = [
    `${chalk.green('✓')} ${chalk.cyan(summary.projectName)}: ${counts} (${pluralize(summary.chunksWritten, 'chunk')} written)`,
  ];
  for (const failure of summary.failures) {
    lines.push(`  ${chalk.yellow('!')} ${failure.path} ${chalk.dim(`${failure.kind}: ${failure.reason}`)}`);
  }
  return lines;
}

/**
 * Spinner for interactive terminals only; --json and pipes get nothing.
 */
function createProgress(ctx: CommandContext): Pick<IngestOptions, 'onDocumentStart' | 'onDocumentComplete' | 'onWarning'> & { spinner?: Ora } {
  const spinner = !ctx.options.json && process.stdout.isTTY ? ora('Scanning documents').start() : undefined;

  return {
    spinner,
    onDocumentStart: (path, change) => {
      if (spinner) spinner.text = `Embedding ${path}`;
      ctx.debug(`${change}: ${path}`);
    },
    onDocumentComplete: (path, chunkCount) => {
      ctx.debug(`${path}: ${pluralize(chunkCount, 'chunk')}`);
    },
    onWarning: (message, path) => {
      const text = path ? `${path}: ${message}` : message;
      if (spinner) {
        spinner.clear();
        ctx.warn(text);
        spinner.render();
      } else {
        ctx.warn(text);
      }
    },
  };
}

export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('[project]', 'Project name (folder under projects_dir)')
    .description('Ingest new and changed documents of a project')
    .option('-a, --all', 'Ingest every project folder under projects_dir', false)
    .option('-p, --path <dir>', 'Document folder, when not projects_dir/<project>')
    .option('-f, --force', 'Drop stored vectors and re-embed everything', false)
    .action(async (project: string | undefined, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();

      if (cmdOptions.all && project) {
        throw new ValidationError('Use either a project name or --all, not both');
      }
      if (!cmdOptions.all && !project) {
        throw new ValidationError('Missing project name', ['Pass a project name, or --all for every project folder']);
      }
      if (cmdOptions.all && cmdOptions.path) {
        throw new ValidationError('--path cannot be combined with --all');
      }

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);

      const { spinner, ...callbacks } = createProgress(ctx);
      const options: IngestOptions = {
        force: cmdOptions.force,
        signal: controller.signal,
        ...callbacks,
      };

      try {
        await withKnowledgeBase(ctx, async (kb) => {
          if (project) {
            ctx.debug(`Ingesting ${project}${cmdOptions.path ? ` from ${cmdOptions.path}` : ''}`);
            const summary = await kb.ingest(project, {
              ...options,
              path: cmdOptions.path ? resolve(cmdOptions.path) : undefined,
            });
            spinner?.stop();
            if (ctx.options.json) {
              printJson(summary);
              return;
            }
            formatSummary(summary).forEach((line) => ctx.log(line));
            return;
          }

          ctx.debug(`Ingesting every project under ${kb.projectsDir}`);
          const results = await kb.ingestAll(options);
          spinner?.stop();
          reportAll(ctx, results);
        });
      } catch (error) {
        spinner?.fail('Ingestion stopped');
        throw error;
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}

function reportAll(ctx: CommandContext, results: ProjectIngestionResult[]): void {
  const failed = results.filter((r) => r.status === 'error');
  if (failed.length > 0) {
    process.exitCode = 1;
  }

  if (ctx.options.json) {
    printJson(
      results.map((r) =>
        r.status === 'ok'
          ? r
          : { projectName: r.projectName, status: r.status, error: { kind: r.error.name, message: r.error.message } }
      )
    );
    return;
  }

  if (results.length === 0) {
    ctx.log(chalk.yellow('No project folders found.'));
    return;
  }

  for (const result of results) {
    if (result.status === 'ok') {
      formatSummary(result.summary).forEach((line) => ctx.log(line));
    } else {
      ctx.log(`${chalk.red('✗')} ${chalk.cyan(result.projectName)}: ${result.error.message}`);
    }
  }
  ctx.log('');
  ctx.log(chalk.dim(`${pluralize(results.length - failed.length, 'project')} ingested, ${failed.length} failed`));
}
