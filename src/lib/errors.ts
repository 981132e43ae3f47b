/**
 * Custom error classes for fmt-gate
 *
 * These provide structured error handling with specific error types
 * that can be caught and handled differently based on the error kind.
 */

/**
 * Base error class for all fmt-gate errors
 */
export class FmtGateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FmtGateError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when an external tool cannot be run
 */
export class ToolInvocationError extends FmtGateError {
  public readonly command: string;
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(message: string, options: { command: string; exitCode?: number; stderr?: string }) {
    super(message);
    this.name = 'ToolInvocationError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends FmtGateError {
  public readonly configFile?: string;
  public readonly field?: string;

  constructor(message: string, options: { configFile?: string; field?: string } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.configFile = options.configFile;
    this.field = options.field;
  }
}

/**
 * Error thrown when the git hook cannot be installed or removed
 */
export class HookInstallError extends FmtGateError {
  public readonly hookPath?: string;

  constructor(message: string, options: { hookPath?: string } = {}) {
    super(message);
    this.name = 'HookInstallError';
    this.hookPath = options.hookPath;
  }
}

/**
 * Type guard to check if error is a FmtGateError
 */
export function isFmtGateError(error: unknown): error is FmtGateError {
  return error instanceof FmtGateError;
}

/**
 * Type guard to check if error is a ToolInvocationError
 */
export function isToolInvocationError(error: unknown): error is ToolInvocationError {
  return error instanceof ToolInvocationError;
}

/**
 * Type guard to check if error is a HookInstallError
 */
export function isHookInstallError(error: unknown): error is HookInstallError {
  return error instanceof HookInstallError;
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
