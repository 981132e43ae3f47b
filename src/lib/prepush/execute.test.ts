/**
 * Pre-push orchestration tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { execSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { executePrePush, isSkipRequested, resolveWorkingRoot } from './execute.js';
import type { PrePushDeps } from './types.js';

const createDeps = (): PrePushDeps => ({
  isCommandAvailable: vi.fn((_cmd: string) => true),
  probeCommand: vi.fn((_argv: string[], _options: { cwd?: string }) => ({
    available: true,
    exitCode: 0,
  })),
  runFormatCheck: vi.fn(async () => ({ output: 'bad.c\n', exitCode: 0, timedOut: false })),
});

describe('isSkipRequested', () => {
  it('accepts 1, true and yes', () => {
    expect(isSkipRequested({ FMT_GATE_SKIP: '1' })).toBe(true);
    expect(isSkipRequested({ FMT_GATE_SKIP: 'TRUE' })).toBe(true);
    expect(isSkipRequested({ FMT_GATE_SKIP: 'yes' })).toBe(true);
  });

  it('ignores anything else', () => {
    expect(isSkipRequested({})).toBe(false);
    expect(isSkipRequested({ FMT_GATE_SKIP: '0' })).toBe(false);
    expect(isSkipRequested({ FMT_GATE_SKIP: '' })).toBe(false);
  });
});

describe('executePrePush', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fmt-gate-exec-')));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('runs from the starting directory outside a repository', () => {
    expect(resolveWorkingRoot(tempDir)).toBe(tempDir);
  });

  it('runs from the repository root when started in a subdirectory', () => {
    execSync('git init -q', { cwd: tempDir });
    const sub = path.join(tempDir, 'src');
    fs.mkdirSync(sub);

    expect(resolveWorkingRoot(sub)).toBe(tempDir);
  });

  it('applies the config file found in the working root', async () => {
    fs.writeFileSync(
      path.join(tempDir, '.fmtgaterc'),
      '{ formatCheck: ["just", "fmt-check"], fixHint: "just fmt", }'
    );
    const deps = createDeps();

    const result = await executePrePush({ cwd: tempDir, env: {} }, deps);

    expect(deps.runFormatCheck).toHaveBeenCalledWith(['just', 'fmt-check'], {
      cwd: tempDir,
      timeout: 300000,
    });
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe(
      'Format Error detected:\n\nbad.c\n\nPlease run `just fmt` before next push.\n'
    );
  });

  it('honours FMT_GATE_SKIP', async () => {
    const deps = createDeps();

    const result = await executePrePush({ cwd: tempDir, env: { FMT_GATE_SKIP: '1' } }, deps);

    expect(result.outcome).toBe('skipped');
    expect(result.exitCode).toBe(0);
    expect(deps.runFormatCheck).not.toHaveBeenCalled();
  });

  it('tolerates malformed stdin', async () => {
    const deps = createDeps();

    const result = await executePrePush(
      {
        cwd: tempDir,
        env: {},
        remoteName: 'origin',
        remoteUrl: 'https://example.com/repo.git',
        stdinText: 'not a ref line\n',
      },
      deps
    );

    expect(result.outcome).toBe('issues-found');
  });
});
