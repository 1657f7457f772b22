#!/usr/bin/env node
/**
 * festgraph CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { registerDepsCommand } from './commands/deps.js';
import { registerReadyCommand } from './commands/ready.js';
import { registerValidateCommand } from './commands/validate.js';
import { loadConfig } from '../core/config.js';
import { getLogger, initLogger } from '../core/logger.js';
import { findFestivalRoot, getProjectDir } from '../core/paths.js';

/** Read version from package.json (dist/cli/index.js -> project root). */
function getPackageVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('festgraph')
  .description('Task dependency graphs for festival plans')
  .version(getPackageVersion());

registerDepsCommand(program);
registerValidateCommand(program);
registerReadyCommand(program);

// Logs go under <festival>/.festgraph once the festival is known.
// Outside a festival the stderr fallback logger is used.
let loggerInitialized = false;
program.hook('preAction', async (_thisCommand, actionCommand) => {
  if (loggerInitialized) return;
  loggerInitialized = true;
  const dir: unknown = actionCommand.opts()['dir'];
  try {
    const root = findFestivalRoot(resolve(typeof dir === 'string' ? dir : process.cwd()));
    const config = await loadConfig(root);
    initLogger(getProjectDir(root), config.logging);
  } catch (err) {
    getLogger('cli').debug({ err }, 'logger init skipped');
  }
});

await program.parseAsync();
