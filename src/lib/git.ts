import { execSync, ExecSyncOptions } from 'child_process';
import path from 'path';
import { ToolInvocationError } from './errors.js';

/**
 * Shell-escape a string for use in a command
 */
function shellEscape(str: string): string {
  // If string contains spaces or special chars, wrap in quotes and escape internal quotes
  if (/[\s"'\\$`]/.test(str)) {
    return `"${str.replace(/["\\$`]/g, '\\$&')}"`;
  }
  return str;
}

/**
 * Execute a git command and return output
 */
export function exec(args: string[], options: { cwd?: string } = {}): string {
  const escapedArgs = args.map(shellEscape);
  const cmd = `git ${escapedArgs.join(' ')}`;
  const execOptions: ExecSyncOptions = {
    encoding: 'utf8',
    cwd: options.cwd,
    stdio: ['pipe', 'pipe', 'pipe'],
  };

  try {
    const result = execSync(cmd, execOptions);
    return result.toString().trimEnd();
  } catch (error) {
    const details = error instanceof Error && 'stderr' in error ? String(error.stderr ?? '') : '';
    const status = error instanceof Error && 'status' in error ? error.status : undefined;
    throw new ToolInvocationError(`Git command failed: ${cmd}${details ? `\n${details.trim()}` : ''}`, {
      command: cmd,
      exitCode: typeof status === 'number' ? status : undefined,
      stderr: details || undefined,
    });
  }
}

/**
 * Execute a git command, returning null on failure instead of throwing
 */
export function execSafe(args: string[], options: { cwd?: string } = {}): string | null {
  try {
    return exec(args, options);
  } catch {
    return null;
  }
}

/**
 * Get the root directory of the current git repository
 */
export function getRepoRoot(cwd?: string): string {
  const result = exec(['rev-parse', '--show-toplevel'], { cwd });
  // Normalize path for cross-platform compatibility
  return path.normalize(result);
}

/**
 * Check whether cwd is inside a git work tree
 */
export function isInsideRepo(cwd?: string): boolean {
  return execSafe(['rev-parse', '--is-inside-work-tree'], { cwd }) === 'true';
}

/**
 * Resolve a path inside the git directory, honouring core.hooksPath and worktrees.
 * Relative results are resolved against cwd, as git prints them.
 */
export function getGitPath(name: string, cwd?: string): string {
  const result = exec(['rev-parse', '--git-path', name], { cwd });
  return path.resolve(cwd ?? process.cwd(), result);
}

/**
 * Directory git reads hooks from
 */
export function getHooksDir(cwd?: string): string {
  return getGitPath('hooks', cwd);
}
