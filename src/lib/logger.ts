/**
 * Logging system for fmt-gate
 *
 * Consola-based singleton logger. Everything goes to stderr so the hook's
 * own verdict on stdout stays clean.
 *
 * Configuration sources (in order of priority):
 * 1. CLI flags (--quiet, --verbose, --no-color)
 * 2. Environment variable FMT_GATE_LOG_LEVEL
 * 3. Default (INFO)
 */

import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { DEFAULT_LOG_LEVEL, ENV_LOG_LEVEL, LogLevel, PACKAGE_NAME } from './constants.js';
import { codes, isColorEnabled, setColorEnabled } from './colors.js';

export { LogLevel };

// ---------------------------------------------------------------------------
// ConditionalStderrReporter
// ---------------------------------------------------------------------------

/**
 * Writes to stderr based on log level and verbose mode.
 * WARN and ERROR always print; DEBUG/INFO/TRACE only print when verbose=true.
 */
export class ConditionalStderrReporter implements ConsolaReporter {
  private verbose: boolean;
  private useColors: boolean;

  constructor(verbose: boolean, useColors: boolean) {
    this.verbose = verbose;
    this.useColors = useColors;
  }

  log(logObj: LogObject): void {
    // Level < 2 means warn (1) or error/fatal (0) — always print
    if (logObj.level >= 2 && !this.verbose) {
      return;
    }

    const levelName = levelToName(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const message = formatLogArgs(logObj.args);
    const prefix = this.useColors
      ? colorizeLevel(levelName, logObj.level)
      : `[${PACKAGE_NAME}] ${levelName}`;

    process.stderr.write(`${prefix}${tag} ${message}\n`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function levelToName(level: number): string {
  if (level <= 0) {
    return level === 0 ? 'ERROR' : 'SILENT';
  }
  switch (level) {
    case 1:
      return 'WARN';
    case 2:
      return 'LOG';
    case 3:
      return 'INFO';
    case 4:
      return 'DEBUG';
    default:
      return 'TRACE';
  }
}

function colorizeLevel(name: string, level: number): string {
  const label = `[${PACKAGE_NAME}] ${name}`;
  switch (true) {
    case level <= 0:
      return `${codes.red}${label}${codes.reset}`;
    case level === 1:
      return `${codes.yellow}${label}${codes.reset}`;
    case level <= 3:
      return `${codes.cyan}${label}${codes.reset}`;
    default:
      return `${codes.brightBlack}${label}${codes.reset}`;
  }
}

export function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => (typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a)))
    .join(' ');
}

// ---------------------------------------------------------------------------
// Logger singleton
// ---------------------------------------------------------------------------

/**
 * The singleton consola logger instance.
 * Starts with empty reporters — call initializeLogger() to configure.
 */
export const logger = createConsola({
  level: DEFAULT_LOG_LEVEL,
  reporters: [],
});

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
}

/**
 * Resolve the numeric level from flags and environment
 */
export function resolveLogLevel(options: LoggerOptions = {}): number {
  if (options.quiet) {
    return LogLevel.ERROR;
  }
  if (options.verbose) {
    return LogLevel.DEBUG;
  }
  const fromEnv = process.env[ENV_LOG_LEVEL];
  if (fromEnv) {
    return parseLogLevel(fromEnv) ?? DEFAULT_LOG_LEVEL;
  }
  return DEFAULT_LOG_LEVEL;
}

/**
 * Configure the logger with CLI flags, env vars, and reporters.
 * Safe to call multiple times (replaces reporters each time).
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  const level = resolveLogLevel(options);
  logger.level = level;

  if (options.noColor) {
    setColorEnabled(false);
  }
  const useColors = isColorEnabled();

  // INFO and below stay quiet unless the level was raised by flag or env
  const verbose = level > DEFAULT_LOG_LEVEL;
  logger.setReporters([new ConditionalStderrReporter(verbose, useColors)]);
}

/**
 * Parse a string log level name to its numeric consola equivalent.
 * Returns undefined for unrecognized values.
 */
export function parseLogLevel(value: string): number | undefined {
  const normalized = value.toLowerCase().trim();
  const mapping: Record<string, number> = {
    silent: LogLevel.SILENT,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    warning: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
    verbose: LogLevel.DEBUG,
  };
  return mapping[normalized];
}

/**
 * Reset module-level state for test isolation.
 * Prefixed with _ to signal internal-only use.
 */
export function _resetForTesting(): void {
  logger.setReporters([]);
  logger.level = DEFAULT_LOG_LEVEL;
}
