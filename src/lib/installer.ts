/**
 * Git hook installer
 *
 * Writes a small sh shim into the repository's hooks directory that hands
 * the hook arguments and stdin to `fmt-gate run`.
 */

import fs from 'fs';
import path from 'path';
import { HOOK_BACKUP_SUFFIX, HOOK_MARKER, HOOK_NAME, PACKAGE_NAME } from './constants.js';
import { HookInstallError } from './errors.js';
import * as git from './git.js';
import { logger } from './logger.js';

/**
 * State of the pre-push hook in a repository
 */
export type HookStatus = 'installed' | 'foreign' | 'absent';

export interface InstallOptions {
  /** Any directory inside the repository */
  cwd?: string;
  /** Move an existing foreign hook aside instead of failing */
  force?: boolean;
}

export interface InstallResult {
  hookPath: string;
  /** Where a foreign hook was moved to, if one was */
  backupPath?: string;
  /** True when an fmt-gate hook was already there and got rewritten */
  replaced: boolean;
}

export interface UninstallResult {
  hookPath: string;
  removed: boolean;
  /** Set when a backed-up hook was put back */
  restoredFrom?: string;
  /** Set when the hook was left alone because fmt-gate did not write it */
  reason?: string;
}

/**
 * Script written to .git/hooks/pre-push
 */
export function getHookScript(): string {
  return [
    '#!/bin/sh',
    HOOK_MARKER,
    `# Remove with: ${PACKAGE_NAME} uninstall`,
    '',
    `if command -v ${PACKAGE_NAME} >/dev/null 2>&1; then`,
    `  exec ${PACKAGE_NAME} run "$@"`,
    'fi',
    '',
    'root=$(git rev-parse --show-toplevel 2>/dev/null || pwd)',
    `if [ -x "$root/node_modules/.bin/${PACKAGE_NAME}" ]; then`,
    `  exec "$root/node_modules/.bin/${PACKAGE_NAME}" run "$@"`,
    'fi',
    '',
    `echo "Warning: ${PACKAGE_NAME} is not installed. Skipping format check."`,
    'exit 0',
    '',
  ].join('\n');
}

/**
 * Whether a hook file was written by fmt-gate
 */
export function isManagedHook(content: string): boolean {
  return content.split('\n').some((line) => line.trim() === HOOK_MARKER);
}

/**
 * Locate the pre-push hook file for the repository containing cwd
 */
export function getHookPath(cwd?: string): string {
  const repoRoot = git.getRepoRoot(cwd);
  return path.join(git.getHooksDir(repoRoot), HOOK_NAME);
}

function readHook(hookPath: string): string | null {
  try {
    return fs.readFileSync(hookPath, 'utf8');
  } catch {
    return null;
  }
}

/**
 * Report whether the hook is ours, someone else's, or missing
 */
export function getHookStatus(options: { cwd?: string } = {}): HookStatus {
  const content = readHook(getHookPath(options.cwd));
  if (content === null) return 'absent';
  return isManagedHook(content) ? 'installed' : 'foreign';
}

/**
 * Install the pre-push hook
 */
export function installHook(options: InstallOptions = {}): InstallResult {
  const hookPath = getHookPath(options.cwd);
  const existing = readHook(hookPath);
  let backupPath: string | undefined;

  if (existing !== null && !isManagedHook(existing)) {
    if (!options.force) {
      throw new HookInstallError(
        `A ${HOOK_NAME} hook already exists at ${hookPath}. Use --force to replace it (a backup is kept).`,
        { hookPath }
      );
    }
    backupPath = `${hookPath}${HOOK_BACKUP_SUFFIX}`;
    if (fs.existsSync(backupPath)) {
      throw new HookInstallError(
        `A backup already exists at ${backupPath}. Move it away before replacing ${hookPath}.`,
        { hookPath }
      );
    }
    fs.renameSync(hookPath, backupPath);
    logger.info(`Moved existing hook to ${backupPath}`);
  }

  try {
    fs.mkdirSync(path.dirname(hookPath), { recursive: true });
    fs.writeFileSync(hookPath, getHookScript(), 'utf8');
    fs.chmodSync(hookPath, 0o755);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new HookInstallError(`Failed to write ${hookPath}: ${message}`, { hookPath });
  }

  logger.debug(`Wrote ${hookPath}`);
  return { hookPath, backupPath, replaced: existing !== null && backupPath === undefined };
}

/**
 * Remove the pre-push hook if fmt-gate installed it
 */
export function uninstallHook(options: { cwd?: string } = {}): UninstallResult {
  const hookPath = getHookPath(options.cwd);
  const existing = readHook(hookPath);

  if (existing === null) {
    return { hookPath, removed: false, reason: 'No pre-push hook is installed' };
  }

  if (!isManagedHook(existing)) {
    return { hookPath, removed: false, reason: 'The pre-push hook was not installed by fmt-gate' };
  }

  fs.unlinkSync(hookPath);

  const backupPath = `${hookPath}${HOOK_BACKUP_SUFFIX}`;
  if (fs.existsSync(backupPath)) {
    fs.renameSync(backupPath, hookPath);
    return { hookPath, removed: true, restoredFrom: backupPath };
  }

  return { hookPath, removed: true };
}
