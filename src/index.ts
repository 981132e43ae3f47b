/**
 * fmt-gate - git pre-push hook that blocks pushes failing a format check
 *
 * @packageDocumentation
 */

// Export all library modules
export * as config from './lib/config.js';
export * as colors from './lib/colors.js';
export * as git from './lib/git.js';
export * as installer from './lib/installer.js';
export * as tools from './lib/tools.js';
export * as prepush from './lib/prepush/index.js';

export { runFormatCheck } from './lib/format-check.js';
export { logger, initializeLogger } from './lib/logger.js';
export {
  FmtGateError,
  ToolInvocationError,
  ConfigurationError,
  HookInstallError,
  isFmtGateError,
  isToolInvocationError,
  isHookInstallError,
} from './lib/errors.js';

// Export key types
export type { FmtGateConfig, ResolvedConfig, LoadConfigResult } from './lib/config.js';
export type { ValidationError, ValidationResult } from './lib/config-validation.js';
export type { FormatCheckResult, FormatCheckOptions } from './lib/format-check.js';
export type { ProbeResult } from './lib/tools.js';
export type { HookStatus, InstallOptions, InstallResult, UninstallResult } from './lib/installer.js';
export type {
  PrePushInput,
  PrePushResult,
  PrePushOutcome,
  PrePushDeps,
  RefUpdate,
  RefUpdateKind,
} from './lib/prepush/index.js';
