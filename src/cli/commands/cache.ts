/**
 * Cache Command
 *
 *   grantkb cache stats    entries per project, hits and misses this run
 *   grantkb cache clear    drop every cached answer
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { printJson, withKnowledgeBase } from '../context.js';
import { formatTable, pluralize } from '../format.js';

export function createCacheCommand(getContext: () => CommandContext): Command {
  const cache = new Command('cache').description('Inspect or clear the response cache');

  cache
    .command('clear')
    .description('Delete every cached answer')
    .action(async () => {
      const ctx = getContext();
      const removed = await withKnowledgeBase(ctx, (kb) => kb.clearCache());

      if (ctx.options.json) {
        printJson({ removed });
        return;
      }
      ctx.log(`${chalk.green('✓')} Cleared ${pluralize(removed, 'cached answer')}`);
    });

  cache
    .command('stats')
    .description('Show cached answers per project')
    .action(async () => {
      const ctx = getContext();
      const stats = await withKnowledgeBase(ctx, (kb) => kb.cacheStats());

      if (ctx.options.json) {
        printJson(stats);
        return;
      }

      if (stats.entries === 0) {
        ctx.log(chalk.yellow('The response cache is empty.'));
        return;
      }

      ctx.log(
        formatTable(
          [
            { header: 'Project', key: 'project' },
            { header: 'Entries', key: 'entries', align: 'right' },
          ],
          stats.byProject
        )
      );
      ctx.log('');
      ctx.log(chalk.dim(`Total: ${stats.entries}`));
    });

  return cache;
}
