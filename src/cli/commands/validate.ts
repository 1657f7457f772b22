/**
 * CLI validate command: dependency validation for a festival or a sequence.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import { FestGraphError } from '../../core/errors.js';
import { formatSuccess } from '../../core/output.js';
import { validateFestival, validateSequence } from '../../core/graph/index.js';
import { ExitCode } from '../../types/exit-codes.js';
import { handleCommandError, loadFestivalContext, type DirOption } from '../festival-context.js';

interface ValidateCommandOptions extends DirOption {
  sequence?: string;
}

/**
 * Register the validate command.
 * Exits with VALIDATION_ERROR when any hard error is found.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check for dependency cycles, missing references and numbering gaps')
    .option('--sequence <path>', 'Validate one sequence (cycle check only)')
    .option('--dir <path>', 'Run as if started in <path>')
    .action(async (opts: ValidateCommandOptions) => {
      try {
        const { cwd, root, config } = await loadFestivalContext(opts);
        const seqPath = opts.sequence ? resolve(cwd, opts.sequence) : null;
        if (seqPath && !existsSync(seqPath)) {
          throw new FestGraphError(ExitCode.INVALID_INPUT, `Sequence directory not found: ${opts.sequence}`, {
            fix: 'Pass a sequence directory relative to --dir or the current directory',
          });
        }

        const result = seqPath
          ? validateSequence(seqPath, { layout: config.layout })
          : validateFestival(root, {
            layout: config.layout,
            numberingGaps: config.validation.numberingGaps,
          });

        console.log(formatSuccess({
          valid: result.valid,
          errors: result.errors,
          warnings: result.warnings,
          totalTasks: result.graph.size,
        }, 'validate'));

        if (!result.valid) {
          process.exitCode = ExitCode.VALIDATION_ERROR;
        }
      } catch (err) {
        handleCommandError(err, 'validate');
      }
    });
}
