/**
 * fmt-gate uninstall - remove the pre-push hook if fmt-gate wrote it
 */

import type { CommandModule } from 'yargs';
import * as colors from '../../lib/colors.js';
import { getErrorMessage } from '../../lib/errors.js';
import { uninstallHook } from '../../lib/installer.js';

export const uninstallCommand: CommandModule<object, object> = {
  command: ['uninstall', 'u'],
  describe: 'Remove the pre-push hook installed by fmt-gate',
  handler: () => {
    try {
      const result = uninstallHook();
      if (!result.removed) {
        console.log(colors.warning(result.reason ?? 'Nothing to remove'));
        return;
      }
      console.log(colors.success(`Removed ${result.hookPath}`));
      if (result.restoredFrom) {
        console.log(colors.gray(`  Restored previous hook from ${result.restoredFrom}`));
      }
    } catch (error) {
      console.error(colors.error(getErrorMessage(error)));
      process.exitCode = 1;
    }
  },
};
