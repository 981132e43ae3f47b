/**
 * Pre-push Dependencies Factory
 *
 * Creates PrePushDeps with real process operations for use in the CLI and API.
 */

import { isCommandAvailable, probeCommand } from '../tools.js';
import { runFormatCheck } from '../format-check.js';
import type { PrePushDeps } from './types.js';

export function createPrePushDeps(): PrePushDeps {
  return {
    isCommandAvailable,
    probeCommand,
    runFormatCheck,
  };
}
