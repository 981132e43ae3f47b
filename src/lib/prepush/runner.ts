/**
 * Pre-push hook body
 *
 * Four sequential steps: style checker on PATH, formatter usable, run the
 * format-check target, branch on whether it printed anything. Every failure
 * except actual formatting issues lets the push through.
 */

import { EXIT_ALLOW, EXIT_BLOCK } from '../constants.js';
import { getErrorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { describeRefUpdate } from './refs.js';
import {
  checkFailedToRun,
  checkTimedOut,
  formatBanner,
  formatterUnavailable,
  styleCheckerMissing,
} from './messages.js';
import type { PrePushDeps, PrePushInput, PrePushOutcome, PrePushResult } from './types.js';

function allow(outcome: PrePushOutcome, message?: string): PrePushResult {
  return {
    exitCode: EXIT_ALLOW,
    outcome,
    stdout: message ? `${message}\n` : '',
  };
}

/**
 * Decide whether the push may proceed
 */
export async function runPrePush(input: PrePushInput, deps: PrePushDeps): Promise<PrePushResult> {
  const { config, cwd } = input;

  if (input.remoteName) {
    logger.debug(`Pushing to ${input.remoteName}${input.remoteUrl ? ` (${input.remoteUrl})` : ''}`);
  }
  for (const ref of input.refs) {
    logger.debug(`Ref update: ${describeRefUpdate(ref)}`);
  }

  if (input.skip) {
    logger.info('Format check skipped by environment');
    return allow('skipped');
  }

  if (!deps.isCommandAvailable(config.styleChecker)) {
    return allow('style-checker-missing', styleCheckerMissing(config.styleChecker));
  }
  logger.debug(`Found ${config.styleChecker}`);

  const probe = deps.probeCommand(config.formatterProbe, { cwd });
  if (!probe.available) {
    logger.debug(`Formatter probe failed: ${probe.error ?? 'unknown reason'}`);
    return allow('formatter-unavailable', formatterUnavailable(config.formatterProbe));
  }
  logger.debug(`Formatter available: ${config.formatterProbe.join(' ')}`);

  let output: string;
  try {
    logger.debug(`Running ${config.formatCheck.join(' ')} in ${cwd}`);
    const result = await deps.runFormatCheck(config.formatCheck, {
      cwd,
      timeout: config.timeout,
    });
    if (result.timedOut) {
      return allow('check-timed-out', checkTimedOut(config.formatCheck, config.timeout));
    }
    logger.debug(`Format check exited with code ${result.exitCode ?? 'null'}`);
    output = result.output;
  } catch (error) {
    const reason = getErrorMessage(error);
    logger.debug(reason);
    return allow('check-failed-to-run', checkFailedToRun(config.formatCheck, reason));
  }

  // Same rule as $(...) capture: trailing newlines do not count
  const issues = output.replace(/\n+$/, '');
  if (issues.length === 0) {
    return allow('clean');
  }

  return {
    exitCode: EXIT_BLOCK,
    outcome: 'issues-found',
    stdout: `${formatBanner(issues, config.fixHint)}\n`,
    issues,
  };
}
