/**
 * Centralized constants and defaults for fmt-gate
 */

/**
 * Package name (used in log prefixes and the installed hook)
 */
export const PACKAGE_NAME = 'fmt-gate';

/**
 * Config file names to look for (in order of priority)
 */
export const CONFIG_FILE_NAMES = ['.fmtgaterc', '.fmtgaterc.json'];

/**
 * Style checker that must be present on PATH. Never invoked.
 */
export const DEFAULT_STYLE_CHECKER = 'clang-format';

/**
 * Version query used to confirm the formatter is usable
 */
export const DEFAULT_FORMATTER_PROBE = ['cargo', 'fmt', '--version'];

/**
 * Build target that reports formatting violations on stdout without fixing them
 */
export const DEFAULT_FORMAT_CHECK = ['make', 'format-check'];

/**
 * Command suggested in the banner when the check fails
 */
export const DEFAULT_FIX_HINT = 'make format';

/**
 * Default timeout for the format check (5 minutes)
 */
export const DEFAULT_CHECK_TIMEOUT = 300000;

/**
 * Lower bound accepted for a configured timeout
 */
export const MIN_CHECK_TIMEOUT = 1000;

/**
 * Exit code that lets git continue with the push
 */
export const EXIT_ALLOW = 0;

/**
 * Exit code that makes git abort the push
 */
export const EXIT_BLOCK = 1;

/**
 * First line of the banner printed around format-check output
 */
export const BANNER_HEADING = 'Format Error detected:';

/**
 * Marker line written into hooks installed by fmt-gate
 */
export const HOOK_MARKER = '# fmt-gate managed hook';

/**
 * Name of the git hook fmt-gate installs
 */
export const HOOK_NAME = 'pre-push';

/**
 * Suffix for a foreign hook moved aside by `install --force`
 */
export const HOOK_BACKUP_SUFFIX = '.backup';

/**
 * Environment variables read by fmt-gate
 */
export const ENV_SKIP = 'FMT_GATE_SKIP';
export const ENV_LOG_LEVEL = 'FMT_GATE_LOG_LEVEL';

/**
 * Log levels (consola numeric levels)
 */
export const LogLevel = {
  SILENT: -999,
  ERROR: 0,
  WARN: 1,
  INFO: 3,
  DEBUG: 4,
  TRACE: 5,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Default log level
 */
export const DEFAULT_LOG_LEVEL: LogLevel = LogLevel.INFO;
