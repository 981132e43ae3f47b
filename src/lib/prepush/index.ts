/**
 * prepush library - public API exports
 */

// Types
export type {
  RefUpdate,
  RefUpdateKind,
  PrePushInput,
  PrePushOutcome,
  PrePushResult,
  PrePushDeps,
} from './types.js';

// Stdin parsing
export { parseRefUpdates, parseRefUpdateLine, describeRefUpdate, isNullSha } from './refs.js';

// Hook body
export { runPrePush } from './runner.js';
export { createPrePushDeps } from './deps.js';
export { formatBanner } from './messages.js';
export { executePrePush, isSkipRequested, resolveWorkingRoot } from './execute.js';
export type { ExecuteOptions } from './execute.js';
