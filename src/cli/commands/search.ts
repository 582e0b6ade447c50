/**
 * Search Command
 *
 * Similarity search within one project:
 *   grantkb search alpha "indirect cost rate"
 *   grantkb search alpha "budget" --top-k 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { parseTopK, printJson, withKnowledgeBase } from '../context.js';
import { preview } from '../format.js';
import type { RetrievedChunk } from '../../search/index.js';

interface SearchCommandOptions {
  topK?: string;
}

export function formatResult(result: RetrievedChunk, rank: number): string[] {
  return [
    `${chalk.bold(`${rank}.`)} ${chalk.cyan(result.sourcePath)} ${chalk.dim(`#${result.ordinal}`)}  ${chalk.green(result.score.toFixed(3))}`,
    `   ${preview(result.text)}`,
  ];
}

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<project>', 'Project to search')
    .argument('<query...>', 'Search text')
    .description('Find the passages most similar to a query')
    .option('-k, --top-k <n>', 'Number of results (default: search.top_k)')
    .action(async (project: string, queryWords: string[], cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();
      const query = queryWords.join(' ');
      const topK = parseTopK(cmdOptions.topK);

      const results = await withKnowledgeBase(ctx, (kb) => kb.search(project, query, topK));
      ctx.debug(`${results.length} result(s) for "${query}" in ${project}`);

      if (ctx.options.json) {
        printJson({ project, query, results });
        return;
      }

      if (results.length === 0) {
        ctx.log(chalk.yellow(`No results in ${project}.`));
        return;
      }

      results.forEach((result, i) => {
        formatResult(result, i + 1).forEach((line) => ctx.log(line));
      });
    });
}
