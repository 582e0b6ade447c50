/**
 * Remove Command
 *
 * Deletes a project's chunks, fingerprints and cached answers. The document
 * folder itself is never touched.
 *   grantkb remove alpha           shows what would go (requires --force)
 *   grantkb remove alpha --force
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { printJson, withKnowledgeBase } from '../context.js';
import { ProjectNotFoundError } from '../../errors/index.js';

interface RemoveOptions {
  force?: boolean;
}

export function createRemoveCommand(getContext: () => CommandContext): Command {
  return new Command('remove')
    .alias('rm')
    .argument('<name>', 'Name of the project to remove')
    .description('Remove a project and all its stored data')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(async (name: string, options: RemoveOptions) => {
      const ctx = getContext();

      await withKnowledgeBase(ctx, async (kb) => {
        const project = kb.getProject(name);
        if (!project) {
          throw new ProjectNotFoundError(name);
        }

        // --json callers are scripts; they opted in by calling remove
        if (!options.force && !ctx.options.json) {
          ctx.log(chalk.yellow(`This will permanently delete the stored data of "${name}".`));
          ctx.log(`  - ${chalk.dim('Path:')} ${project.path}`);
          ctx.log(`  - ${chalk.dim('Chunks:')} ${project.chunkCount}`);
          ctx.log(`  - ${chalk.dim('Files:')} ${project.fileCount}`);
          ctx.log('');
          ctx.log(`Run with ${chalk.cyan('--force')} to confirm deletion.`);
          process.exitCode = 1;
          return;
        }

        const removed = await kb.removeProject(name);

        if (ctx.options.json) {
          printJson({ success: true, ...removed });
          return;
        }

        ctx.log(`${chalk.green('✓')} Removed project "${chalk.cyan(name)}"`);
        ctx.log(`  - Deleted ${removed.chunksRemoved} chunks`);
        ctx.log(`  - Deleted ${removed.fingerprintsRemoved} fingerprints`);
        ctx.log(`  - Deleted ${removed.cacheEntriesRemoved} cached answers`);
      });
    });
}
