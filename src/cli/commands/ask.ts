/**
 * Ask Command
 *
 *   grantkb ask alpha "What is the total requested budget?"
 *
 * Answers come from the response cache when the same question was asked
 * since the project's last change.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { parseTopK, printJson, withKnowledgeBase } from '../context.js';

interface AskCommandOptions {
  topK?: string;
}

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<project>', 'Project to ask about')
    .argument('<question...>', 'Question in natural language')
    .description('Answer a question from a project\'s documents')
    .option('-k, --top-k <n>', 'Passages given to the model (default: search.top_k)')
    .action(async (project: string, questionWords: string[], cmdOptions: AskCommandOptions) => {
      const ctx = getContext();
      const question = questionWords.join(' ');
      const topK = parseTopK(cmdOptions.topK);

      const answer = await withKnowledgeBase(ctx, (kb) => kb.ask(project, question, { topK }));

      if (ctx.options.json) {
        printJson({ project, question, ...answer });
        return;
      }

      ctx.log(answer.answer);
      if (answer.sources.length > 0) {
        ctx.log('');
        ctx.log(chalk.dim('Sources:'));
        answer.sources.forEach((source) => ctx.log(`  - ${chalk.cyan(source)}`));
      }
    });
}
