/**
 * fmt-gate install - write the pre-push hook into the current repository
 */

import type { CommandModule } from 'yargs';
import * as colors from '../../lib/colors.js';
import { getErrorMessage } from '../../lib/errors.js';
import { installHook } from '../../lib/installer.js';

interface InstallArgs {
  force?: boolean;
}

export const installCommand: CommandModule<object, InstallArgs> = {
  command: ['install', 'i'],
  describe: 'Install the pre-push hook in this repository',
  builder: (yargs) => {
    return yargs
      .option('force', {
        alias: 'f',
        type: 'boolean',
        description: 'Replace an existing pre-push hook (it is kept as pre-push.backup)',
        default: false,
      })
      .example('$0 install', 'Install the hook')
      .example('$0 install --force', 'Install over an existing hook');
  },
  handler: (argv) => {
    try {
      const result = installHook({ force: !!argv.force });
      if (result.backupPath) {
        console.log(colors.warning(`Existing hook moved to ${result.backupPath}`));
      }
      const verb = result.replaced ? 'Reinstalled' : 'Installed';
      console.log(colors.success(`${verb} pre-push hook at ${colors.bold(result.hookPath)}`));
    } catch (error) {
      console.error(colors.error(getErrorMessage(error)));
      process.exitCode = 1;
    }
  },
};
