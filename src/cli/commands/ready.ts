/**
 * CLI ready command: tasks that can start now.
 */

import type { Command } from 'commander';
import { formatSuccess } from '../../core/output.js';
import { getReadyTasks, resolveFestival, toTaskRef } from '../../core/graph/index.js';
import { handleCommandError, loadFestivalContext, type DirOption } from '../festival-context.js';

/**
 * Register the ready command.
 */
export function registerReadyCommand(program: Command): void {
  program
    .command('ready')
    .description('List pending tasks whose prerequisites are all complete')
    .option('--dir <path>', 'Run as if started in <path>')
    .action(async (opts: DirOption) => {
      try {
        const { root, config } = await loadFestivalContext(opts);
        const ready = getReadyTasks(resolveFestival(root, { layout: config.layout })).map(toTaskRef);
        console.log(formatSuccess({ ready, count: ready.length }, 'ready'));
      } catch (err) {
        handleCommandError(err, 'ready');
      }
    });
}
