/**
 * External tool probes
 *
 * Presence checks for the style checker and the formatter. Nothing here
 * looks at what the tools print; only whether they can be found or run.
 */

import { spawnSync } from 'child_process';

/**
 * Outcome of running a probe command
 */
export interface ProbeResult {
  /** True when the command ran and exited 0 */
  available: boolean;
  /** Exit code, or null when the process never started or was killed */
  exitCode: number | null;
  /** Why the probe failed, when it did */
  error?: string;
}

/**
 * Probes get a short leash; a version query should return immediately
 */
export const PROBE_TIMEOUT = 30000;

/**
 * Check if a command is available on the system
 *
 * The name is passed as a positional parameter so it is never parsed by the shell.
 */
export function isCommandAvailable(cmd: string): boolean {
  if (!cmd) {
    return false;
  }

  try {
    const result =
      process.platform === 'win32'
        ? spawnSync('where', [cmd], { stdio: 'ignore' })
        : spawnSync('/bin/sh', ['-c', 'command -v "$1"', 'sh', cmd], { stdio: 'ignore' });
    return result.status === 0;
  } catch {
    return false;
  }
}

/**
 * Run a command with its output discarded and report whether it succeeded
 */
export function probeCommand(
  argv: string[],
  options: { cwd?: string; timeout?: number } = {}
): ProbeResult {
  const [cmd, ...args] = argv;
  if (!cmd) {
    return { available: false, exitCode: null, error: 'Empty command' };
  }

  const result = spawnSync(cmd, args, {
    cwd: options.cwd,
    stdio: 'ignore',
    timeout: options.timeout ?? PROBE_TIMEOUT,
  });

  if (result.error) {
    return { available: false, exitCode: null, error: result.error.message };
  }

  if (result.status === 0) {
    return { available: true, exitCode: 0 };
  }

  return {
    available: false,
    exitCode: result.status,
    error:
      result.status === null
        ? `${argv.join(' ')} was terminated by ${result.signal ?? 'a signal'}`
        : `${argv.join(' ')} exited with code ${result.status}`,
  };
}
