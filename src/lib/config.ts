import fs from 'fs';
import path from 'path';
import JSON5 from 'json5';
import {
  CONFIG_FILE_NAMES,
  DEFAULT_CHECK_TIMEOUT,
  DEFAULT_FIX_HINT,
  DEFAULT_FORMAT_CHECK,
  DEFAULT_FORMATTER_PROBE,
  DEFAULT_STYLE_CHECKER,
} from './constants.js';
import { logger } from './logger.js';
import { formatValidationErrors, validateConfig, type ValidationError } from './config-validation.js';

/**
 * Configuration for fmt-gate
 */
export interface FmtGateConfig {
  /** Editor hint, ignored at runtime */
  $schema?: string;

  /**
   * Executable that must be on PATH. Presence-checked only.
   * Default: "clang-format"
   */
  styleChecker?: string;

  /**
   * Formatter version query; a zero exit means the formatter is usable
   * Default: ["cargo", "fmt", "--version"]
   */
  formatterProbe?: string[];

  /**
   * Format-check target; any stdout output means formatting issues
   * Default: ["make", "format-check"]
   */
  formatCheck?: string[];

  /**
   * Command suggested in the failure banner
   * Default: "make format"
   */
  fixHint?: string;

  /**
   * Milliseconds allowed for the format check
   * Default: 300000
   */
  timeout?: number;
}

export type ResolvedConfig = Required<Omit<FmtGateConfig, '$schema'>>;

/**
 * Result of loading config, with anything that went wrong on the way
 */
export interface LoadConfigResult {
  config: ResolvedConfig;
  configPath: string | null;
  errors: ValidationError[];
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): ResolvedConfig {
  return {
    styleChecker: DEFAULT_STYLE_CHECKER,
    formatterProbe: [...DEFAULT_FORMATTER_PROBE],
    formatCheck: [...DEFAULT_FORMAT_CHECK],
    fixHint: DEFAULT_FIX_HINT,
    timeout: DEFAULT_CHECK_TIMEOUT,
  };
}

/**
 * Find config file in repository
 */
export function findConfigFile(repoRoot: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = path.join(repoRoot, fileName);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Parse config text, trying JSON first then JSON5 (comments, trailing commas)
 */
export function parseConfigText(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return JSON5.parse(content);
  }
}

/**
 * Overlay a validated user config on the defaults
 */
export function mergeConfig(defaults: ResolvedConfig, userConfig: FmtGateConfig): ResolvedConfig {
  return {
    styleChecker: userConfig.styleChecker ?? defaults.styleChecker,
    formatterProbe: userConfig.formatterProbe ?? defaults.formatterProbe,
    formatCheck: userConfig.formatCheck ?? defaults.formatCheck,
    fixHint: userConfig.fixHint ?? defaults.fixHint,
    timeout: userConfig.timeout ?? defaults.timeout,
  };
}

/**
 * Load configuration from repository, reporting parse and schema errors
 * instead of throwing. Any error falls back to the defaults.
 */
export function loadConfigWithValidation(repoRoot: string): LoadConfigResult {
  const defaults = getDefaultConfig();
  const configPath = findConfigFile(repoRoot);

  if (!configPath) {
    return { config: defaults, configPath: null, errors: [] };
  }

  let parsed: unknown;
  try {
    parsed = parseConfigText(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { config: defaults, configPath, errors: [{ path: '/', message: `Invalid JSON: ${message}` }] };
  }

  const validation = validateConfig(parsed);
  if (!validation.valid) {
    return { config: defaults, configPath, errors: validation.errors };
  }

  return { config: mergeConfig(defaults, validation.config), configPath, errors: [] };
}

/**
 * Load configuration from repository
 * Merges with defaults, repo config takes precedence.
 * An invalid file is reported as a warning and ignored.
 */
export function loadConfig(repoRoot: string): ResolvedConfig {
  const result = loadConfigWithValidation(repoRoot);

  if (result.errors.length > 0) {
    logger.warn(
      `Ignoring ${result.configPath ?? 'config'}; using defaults:\n${formatValidationErrors(result.errors)}`
    );
  } else if (result.configPath) {
    logger.debug(`Loaded config from ${result.configPath}`);
  }

  return result.config;
}
