/**
 * fmt-gate status - show hook state and the tools the check will use
 */

import type { CommandModule } from 'yargs';
import * as colors from '../../lib/colors.js';
import { loadConfigWithValidation, type ResolvedConfig } from '../../lib/config.js';
import { formatValidationErrors } from '../../lib/config-validation.js';
import { getErrorMessage } from '../../lib/errors.js';
import * as git from '../../lib/git.js';
import { getHookStatus, type HookStatus } from '../../lib/installer.js';
import { isCommandAvailable, probeCommand } from '../../lib/tools.js';

function hookLabel(status: HookStatus): string {
  switch (status) {
    case 'installed':
      return colors.green('installed');
    case 'foreign':
      return colors.yellow('another pre-push hook is installed');
    default:
      return colors.gray('not installed');
  }
}

/**
 * Human-readable summary of tool availability
 */
export function describeTools(config: ResolvedConfig, cwd: string): string[] {
  const checker = isCommandAvailable(config.styleChecker);
  const formatter = probeCommand(config.formatterProbe, { cwd });
  const mark = (ok: boolean) => (ok ? colors.green('found') : colors.red('missing'));
  return [
    `  Style checker:  ${config.styleChecker} (${mark(checker)})`,
    `  Formatter:      ${config.formatterProbe.join(' ')} (${mark(formatter.available)})`,
    `  Format check:   ${config.formatCheck.join(' ')}`,
  ];
}

export const statusCommand: CommandModule<object, object> = {
  command: ['status', 's'],
  describe: 'Show whether the hook is installed and which tools are found',
  handler: () => {
    try {
      const repoRoot = git.getRepoRoot();
      const { config, configPath, errors } = loadConfigWithValidation(repoRoot);

      console.log(`${colors.bold('Hook:')} ${hookLabel(getHookStatus({ cwd: repoRoot }))}`);
      console.log(`${colors.bold('Config:')} ${configPath ?? colors.gray('defaults')}`);
      if (errors.length > 0) {
        console.log(colors.warning(`Config is invalid, defaults in use:\n${formatValidationErrors(errors)}`));
      }
      console.log(colors.bold('Tools:'));
      for (const line of describeTools(config, repoRoot)) {
        console.log(line);
      }
    } catch (error) {
      console.error(colors.error(getErrorMessage(error)));
      process.exitCode = 1;
    }
  },
};
