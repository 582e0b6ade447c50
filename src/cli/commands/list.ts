/**
 * List Command
 *
 *   grantkb list         table of ingested projects
 *   grantkb ls --json    same, as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { printJson, withKnowledgeBase } from '../context.js';
import { formatRelativeTime, formatTable, pluralize, type Column } from '../format.js';

const COLUMNS: Column[] = [
  { header: 'Name', key: 'name' },
  { header: 'Files', key: 'files', align: 'right' },
  { header: 'Chunks', key: 'chunks', align: 'right' },
  { header: 'Model', key: 'model' },
  { header: 'Last Ingested', key: 'indexed' },
];

export function createListCommand(getContext: () => CommandContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List ingested projects')
    .action(async () => {
      const ctx = getContext();
      const projects = await withKnowledgeBase(ctx, (kb) => kb.listProjects());
      ctx.debug(`Found ${projects.length} project(s)`);

      if (ctx.options.json) {
        printJson({ count: projects.length, projects });
        return;
      }

      if (projects.length === 0) {
        ctx.log(chalk.yellow('No projects ingested yet.'));
        ctx.log('');
        ctx.log(chalk.dim('Get started:'));
        ctx.log(`  ${chalk.cyan('grantkb ingest <project>')}`);
        return;
      }

      const rows = projects.map((p) => ({
        name: p.name,
        files: p.fileCount,
        chunks: p.chunkCount,
        model: p.embeddingModel ?? '-',
        indexed: formatRelativeTime(p.indexedAt),
      }));

      ctx.log(formatTable(COLUMNS, rows));
      ctx.log('');
      ctx.log(chalk.dim(pluralize(projects.length, 'project')));
    });
}
