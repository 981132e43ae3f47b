/**
 * Text the hook prints on stdout
 */

import { BANNER_HEADING } from '../constants.js';

const SKIP_SUFFIX = 'Skipping format check.';

export function styleCheckerMissing(name: string): string {
  return `Warning: ${name} is not installed. ${SKIP_SUFFIX}`;
}

export function formatterUnavailable(argv: string[]): string {
  return `Warning: \`${argv.join(' ')}\` is not available. ${SKIP_SUFFIX}`;
}

export function checkFailedToRun(argv: string[], reason: string): string {
  return `Warning: could not run \`${argv.join(' ')}\` (${reason}). ${SKIP_SUFFIX}`;
}

export function checkTimedOut(argv: string[], timeout: number): string {
  return `Warning: \`${argv.join(' ')}\` timed out after ${timeout}ms. ${SKIP_SUFFIX}`;
}

/**
 * Frame format-check output in the fixed banner
 */
export function formatBanner(issues: string, fixHint: string): string {
  return [
    BANNER_HEADING,
    '',
    issues,
    '',
    `Please run \`${fixHint}\` before next push.`,
  ].join('\n');
}
