/**
 * fmt-gate run - pre-push hook entry point
 *
 * git passes the remote name and URL as arguments and the ref updates on stdin.
 */

import type { CommandModule } from 'yargs';
import { executePrePush } from '../../lib/prepush/index.js';
import { readStdin } from '../../lib/stdin.js';
import { reportInternalFailure, reportResult } from './report.js';

interface RunArgs {
  remote?: string;
  url?: string;
}

export const runCommand: CommandModule<object, RunArgs> = {
  command: 'run [remote] [url]',
  describe: 'Run the format check as a git pre-push hook',
  builder: (yargs) => {
    return yargs
      .positional('remote', {
        type: 'string',
        description: 'Name of the remote being pushed to',
      })
      .positional('url', {
        type: 'string',
        description: 'URL of the remote being pushed to',
      })
      .example('$0 run origin git@example.com:team/repo.git', 'What git runs before a push');
  },
  handler: async (argv) => {
    try {
      const stdinText = await readStdin();
      const result = await executePrePush({
        remoteName: argv.remote,
        remoteUrl: argv.url,
        stdinText,
      });
      reportResult(result);
    } catch (error) {
      reportInternalFailure(error);
    }
  },
};
