#!/usr/bin/env node
/**
 * fmt-gate - block pushes that fail the project's format check
 *
 * Commands:
 *   fmt-gate run [remote] [url]   Run as the git pre-push hook
 *   fmt-gate check                Run the check without pushing
 *   fmt-gate install [--force]    Install the pre-push hook
 *   fmt-gate uninstall            Remove the pre-push hook
 *   fmt-gate status               Show hook and tool status
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { runCommand } from './fmt-gate/run.js';
import { checkCommand } from './fmt-gate/check.js';
import { installCommand } from './fmt-gate/install.js';
import { uninstallCommand } from './fmt-gate/uninstall.js';
import { statusCommand } from './fmt-gate/status.js';
import { initializeLogger } from '../lib/logger.js';

yargs(hideBin(process.argv))
  .scriptName('fmt-gate')
  .usage('$0 <command> [options]')
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    description: 'Show debug logging on stderr',
    global: true,
  })
  .option('quiet', {
    alias: 'q',
    type: 'boolean',
    description: 'Only log errors',
    global: true,
  })
  .option('color', {
    type: 'boolean',
    description: 'Colorize output (use --no-color to disable)',
    default: true,
    global: true,
  })
  .middleware((argv) => {
    // Runs after parsing, before any handler
    initializeLogger({
      verbose: !!argv.verbose,
      quiet: !!argv.quiet,
      noColor: argv.color === false,
    });
  })
  .command(runCommand)
  .command(checkCommand)
  .command(installCommand)
  .command(uninstallCommand)
  .command(statusCommand)
  .demandCommand(1, 'Specify a command')
  .alias('h', 'help')
  .help()
  .version()
  .wrap(Math.min(100, process.stdout.columns ?? 100))
  .example('fmt-gate install', 'Install the pre-push hook')
  .example('fmt-gate check', 'Run the format check now')
  .example('FMT_GATE_SKIP=1 git push', 'Push without running the check')
  .strict()
  .fail((msg, err) => {
    if (err) {
      console.error(err.message);
    } else {
      console.error(msg);
    }
    process.exit(1);
  })
  .parseAsync()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
