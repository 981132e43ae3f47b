/**
 * Shared output handling for the check commands
 */

import * as colors from '../../lib/colors.js';
import { EXIT_ALLOW, PACKAGE_NAME } from '../../lib/constants.js';
import { getErrorMessage } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import type { PrePushResult } from '../../lib/prepush/index.js';

/**
 * Print the verdict on stdout and set the exit code git will see
 */
export function reportResult(result: PrePushResult): void {
  if (result.stdout) {
    process.stdout.write(result.stdout);
  }
  logger.debug(`Outcome: ${result.outcome}`);
  process.exitCode = result.exitCode;
}

/**
 * An unexpected failure inside fmt-gate itself lets the push through
 */
export function reportInternalFailure(error: unknown): void {
  logger.debug(error instanceof Error && error.stack ? error.stack : String(error));
  console.log(colors.warning(`${PACKAGE_NAME} failed: ${getErrorMessage(error)}. Skipping format check.`));
  process.exitCode = EXIT_ALLOW;
}
