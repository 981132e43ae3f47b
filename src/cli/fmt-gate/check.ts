/**
 * fmt-gate check - run the format check without a push
 */

import type { CommandModule } from 'yargs';
import { executePrePush } from '../../lib/prepush/index.js';
import { reportInternalFailure, reportResult } from './report.js';

export const checkCommand: CommandModule<object, object> = {
  command: ['check', 'c'],
  describe: 'Run the format check now (same exit codes as the hook)',
  builder: (yargs) => yargs.example('$0 check', 'Check formatting before committing'),
  handler: async () => {
    try {
      const result = await executePrePush();
      reportResult(result);
    } catch (error) {
      reportInternalFailure(error);
    }
  },
};
