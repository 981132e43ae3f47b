/**
 * prepush types - hook input, dependencies and outcome
 */

import type { ResolvedConfig } from '../config.js';
import type { ProbeResult } from '../tools.js';
import type { FormatCheckOptions, FormatCheckResult } from '../format-check.js';

/**
 * Kind of ref update git announced on stdin
 */
export type RefUpdateKind = 'create' | 'update' | 'delete';

/**
 * One `<local ref> <local sha> <remote ref> <remote sha>` line
 */
export interface RefUpdate {
  localRef: string;
  localSha: string;
  remoteRef: string;
  remoteSha: string;
  kind: RefUpdateKind;
}

/**
 * Everything the hook body needs to reach a verdict
 */
export interface PrePushInput {
  /** Name of the remote being pushed to (first hook argument) */
  remoteName?: string;
  /** URL of the remote (second hook argument) */
  remoteUrl?: string;
  /** Ref updates read from stdin; informational only */
  refs: RefUpdate[];
  /** Directory the tools run in (repository root) */
  cwd: string;
  config: ResolvedConfig;
  /** Skip the check entirely (FMT_GATE_SKIP) */
  skip?: boolean;
}

/**
 * How the hook reached its verdict
 */
export type PrePushOutcome =
  | 'skipped'
  | 'style-checker-missing'
  | 'formatter-unavailable'
  | 'check-failed-to-run'
  | 'check-timed-out'
  | 'clean'
  | 'issues-found';

/**
 * Verdict of the hook
 */
export interface PrePushResult {
  /** 0 lets the push through, 1 blocks it */
  exitCode: 0 | 1;
  outcome: PrePushOutcome;
  /** Text for stdout; empty when there is nothing to say */
  stdout: string;
  /** Format-check output when issues were found */
  issues?: string;
}

/**
 * Side-effecting operations the hook body depends on
 */
export interface PrePushDeps {
  isCommandAvailable: (cmd: string) => boolean;
  probeCommand: (argv: string[], options: { cwd?: string }) => ProbeResult;
  runFormatCheck: (argv: string[], options: FormatCheckOptions) => Promise<FormatCheckResult>;
}
