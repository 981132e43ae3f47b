/**
 * Format-check runner
 *
 * Runs the project's format-check target and captures what it prints.
 * Modeled on the hook executor: spawn, collect, time out, never reject
 * for a non-zero exit.
 */

import { spawn, type ChildProcess } from 'child_process';
import { getErrorMessage, ToolInvocationError } from './errors.js';
import { logger } from './logger.js';

/**
 * Captured result of a format-check run
 */
export interface FormatCheckResult {
  /** Everything the target wrote to stdout */
  output: string;
  /** Exit code, or null when killed */
  exitCode: number | null;
  /** Whether the run was stopped by the timeout */
  timedOut: boolean;
}

export interface FormatCheckOptions {
  cwd?: string;
  timeout?: number;
  env?: Record<string, string>;
  /** Where the target's stderr goes (defaults to this process's stderr) */
  onStderr?: (chunk: string) => void;
}

function stopProcessTree(proc: ChildProcess, ownGroup: boolean): void {
  if (ownGroup && proc.pid !== undefined) {
    try {
      process.kill(-proc.pid, 'SIGTERM');
      return;
    } catch (error) {
      logger.debug(`Could not signal process group ${proc.pid}: ${getErrorMessage(error)}`);
    }
  }
  proc.kill('SIGTERM');
}

/**
 * Run a format-check command. stdout is captured, stderr is passed through.
 *
 * Rejects with ToolInvocationError only when the command cannot be started.
 * A timeout stops the whole process group and resolves at once with what
 * was captured so far and `timedOut: true`.
 */
export function runFormatCheck(
  argv: string[],
  options: FormatCheckOptions = {}
): Promise<FormatCheckResult> {
  const command = argv.join(' ');
  const [cmd, ...args] = argv;

  return new Promise((resolve, reject) => {
    if (!cmd) {
      reject(new ToolInvocationError('No format-check command configured', { command }));
      return;
    }

    const onStderr = options.onStderr ?? ((chunk: string) => process.stderr.write(chunk));

    // Own process group, so a timeout reaches whatever the target forks
    const ownGroup = process.platform !== 'win32';
    const proc = spawn(cmd, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: ownGroup,
    });

    let stdout = '';
    let timedOut = false;
    let settled = false;

    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');
    proc.stdout.on('data', (data: string) => {
      stdout += data;
    });
    proc.stderr.on('data', (data: string) => {
      onStderr(data);
    });

    const timeoutId =
      options.timeout === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            stopProcessTree(proc, ownGroup);
            // Children may still hold the pipes; do not wait for them to close
            proc.stdout.destroy();
            proc.stderr.destroy();
            if (settled) return;
            settled = true;
            resolve({ output: stdout, exitCode: null, timedOut });
          }, options.timeout);

    proc.on('close', (code) => {
      clearTimeout(timeoutId);
      if (settled) return;
      settled = true;
      resolve({ output: stdout, exitCode: code, timedOut });
    });

    proc.on('error', (err) => {
      clearTimeout(timeoutId);
      if (settled) return;
      settled = true;
      reject(
        new ToolInvocationError(`Failed to run ${command}: ${err.message}`, {
          command,
        })
      );
    });
  });
}
