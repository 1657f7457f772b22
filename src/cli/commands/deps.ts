/**
 * CLI deps command: dependency graph, per-task dependencies and critical path.
 */

import type { Command } from 'commander';
import { FestGraphError } from '../../core/errors.js';
import { formatSuccess } from '../../core/output.js';
import { findSequencePath } from '../../core/paths.js';
import {
  findTask,
  getCriticalPath,
  getGraphOverview,
  getTaskDepsView,
  resolveFestival,
  resolveSequence,
  toTaskRef,
} from '../../core/graph/index.js';
import { ExitCode } from '../../types/exit-codes.js';
import { handleCommandError, loadFestivalContext, type DirOption } from '../festival-context.js';

interface DepsOptions extends DirOption {
  all?: boolean;
  criticalPath?: boolean;
}

/**
 * Register the deps command.
 */
export function registerDepsCommand(program: Command): void {
  program
    .command('deps [task]')
    .description('Show task dependencies for the current sequence, or the whole festival with --all')
    .option('--all', 'Resolve every phase and sequence of the festival')
    .option('--critical-path', 'Show the longest dependency chain')
    .option('--dir <path>', 'Run as if started in <path>')
    .action(async (taskRef: string | undefined, opts: DepsOptions) => {
      try {
        const { cwd, root, config } = await loadFestivalContext(opts);
        const layout = config.layout;

        const seqPath = opts.all ? null : findSequencePath(cwd, root);
        const graph = seqPath
          ? resolveSequence(seqPath, { layout })
          : resolveFestival(root, { layout });
        const scope = seqPath ?? root;

        if (taskRef) {
          const task = findTask(graph, taskRef, layout.taskExtension);
          if (!task) {
            throw new FestGraphError(ExitCode.NOT_FOUND, `Task not found: ${taskRef}`, {
              fix: 'Use a task id, name or filename; add --all to search the whole festival',
            });
          }
          console.log(formatSuccess(getTaskDepsView(graph, task), 'deps.task'));
          return;
        }

        if (opts.criticalPath) {
          const path = getCriticalPath(graph).map(toTaskRef);
          console.log(formatSuccess({ scope, path, length: path.length }, 'deps.criticalPath'));
          return;
        }

        console.log(formatSuccess({ scope, overview: getGraphOverview(graph), graph }, 'deps.graph'));
      } catch (err) {
        handleCommandError(err, 'deps');
      }
    });
}
