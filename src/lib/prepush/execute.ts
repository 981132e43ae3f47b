/**
 * Pre-push orchestration
 *
 * Resolves the repository, loads config and parses stdin, then hands off
 * to runPrePush. Shared by `fmt-gate run` and `fmt-gate check`.
 */

import { ENV_SKIP } from '../constants.js';
import { loadConfig } from '../config.js';
import * as git from '../git.js';
import { logger } from '../logger.js';
import { createPrePushDeps } from './deps.js';
import { parseRefUpdates } from './refs.js';
import { runPrePush } from './runner.js';
import type { PrePushDeps, PrePushResult } from './types.js';

export interface ExecuteOptions {
  /** Directory to start from (default: process.cwd()) */
  cwd?: string;
  remoteName?: string;
  remoteUrl?: string;
  /** Raw stdin as git wrote it */
  stdinText?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Whether the environment asks for the check to be bypassed
 */
export function isSkipRequested(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[ENV_SKIP]?.trim().toLowerCase();
  return value === '1' || value === 'true' || value === 'yes';
}

/**
 * Find the directory the tools should run in. Outside a repository the
 * starting directory is used as is.
 */
export function resolveWorkingRoot(cwd: string): string {
  if (!git.isInsideRepo(cwd)) {
    logger.debug(`${cwd} is not inside a git work tree; running there`);
    return cwd;
  }
  return git.getRepoRoot(cwd);
}

export async function executePrePush(
  options: ExecuteOptions = {},
  deps: PrePushDeps = createPrePushDeps()
): Promise<PrePushResult> {
  const root = resolveWorkingRoot(options.cwd ?? process.cwd());
  const config = loadConfig(root);

  const { refs, malformed } = parseRefUpdates(options.stdinText ?? '');
  for (const line of malformed) {
    logger.debug(`Ignoring malformed ref update line: ${line}`);
  }

  return runPrePush(
    {
      remoteName: options.remoteName,
      remoteUrl: options.remoteUrl,
      refs,
      cwd: root,
      config,
      skip: isSkipRequested(options.env),
    },
    deps
  );
}
