/**
 * Pre-push runner tests
 */

import { describe, it, expect, vi } from 'vitest';
import { runPrePush } from './runner.js';
import { getDefaultConfig } from '../config.js';
import { ToolInvocationError } from '../errors.js';
import type { PrePushDeps, PrePushInput } from './types.js';

const createInput = (overrides: Partial<PrePushInput> = {}): PrePushInput => ({
  remoteName: 'origin',
  remoteUrl: 'git@example.com:team/repo.git',
  refs: [],
  cwd: '/work/repo',
  config: getDefaultConfig(),
  ...overrides,
});

const createDeps = (overrides: Partial<PrePushDeps> = {}): PrePushDeps => ({
  isCommandAvailable: vi.fn((_cmd: string) => true),
  probeCommand: vi.fn((_argv: string[], _options: { cwd?: string }) => ({
    available: true,
    exitCode: 0,
  })),
  runFormatCheck: vi.fn(async () => ({ output: '', exitCode: 0, timedOut: false })),
  ...overrides,
});

describe('runPrePush', () => {
  describe('missing tools', () => {
    it('allows the push with a warning when neither tool is installed', async () => {
      const deps = createDeps({
        isCommandAvailable: vi.fn(() => false),
        probeCommand: vi.fn(() => ({ available: false, exitCode: null, error: 'spawn cargo ENOENT' })),
      });

      const result = await runPrePush(createInput(), deps);

      expect(result.exitCode).toBe(0);
      expect(result.outcome).toBe('style-checker-missing');
      expect(result.stdout).toBe(
        'Warning: clang-format is not installed. Skipping format check.\n'
      );
      expect(deps.probeCommand).not.toHaveBeenCalled();
      expect(deps.runFormatCheck).not.toHaveBeenCalled();
    });

    it('allows the push with a warning when the formatter is unavailable', async () => {
      const deps = createDeps({
        probeCommand: vi.fn(() => ({
          available: false,
          exitCode: 101,
          error: 'cargo fmt --version exited with code 101',
        })),
      });

      const result = await runPrePush(createInput(), deps);

      expect(result.exitCode).toBe(0);
      expect(result.outcome).toBe('formatter-unavailable');
      expect(result.stdout).toBe(
        'Warning: `cargo fmt --version` is not available. Skipping format check.\n'
      );
      expect(deps.runFormatCheck).not.toHaveBeenCalled();
    });

    it('checks the configured style checker by name', async () => {
      const deps = createDeps();
      await runPrePush(createInput(), deps);
      expect(deps.isCommandAvailable).toHaveBeenCalledWith('clang-format');
      expect(deps.probeCommand).toHaveBeenCalledWith(['cargo', 'fmt', '--version'], {
        cwd: '/work/repo',
      });
    });
  });

  describe('format check', () => {
    it('allows the push silently when the check prints nothing', async () => {
      const deps = createDeps();

      const result = await runPrePush(createInput(), deps);

      expect(result).toEqual({ exitCode: 0, outcome: 'clean', stdout: '' });
      expect(deps.runFormatCheck).toHaveBeenCalledWith(['make', 'format-check'], {
        cwd: '/work/repo',
        timeout: 300000,
      });
    });

    it('blocks the push and frames the output in the banner', async () => {
      const deps = createDeps({
        runFormatCheck: vi.fn(async () => ({
          output: 'src/main.c: needs formatting\nsrc/lib.rs: needs formatting\n',
          exitCode: 0,
          timedOut: false,
        })),
      });

      const result = await runPrePush(createInput(), deps);

      expect(result.exitCode).toBe(1);
      expect(result.outcome).toBe('issues-found');
      expect(result.issues).toBe('src/main.c: needs formatting\nsrc/lib.rs: needs formatting');
      expect(result.stdout).toBe(
        [
          'Format Error detected:',
          '',
          'src/main.c: needs formatting',
          'src/lib.rs: needs formatting',
          '',
          'Please run `make format` before next push.',
          '',
        ].join('\n')
      );
    });

    it('decides on output, not on the exit code of the check', async () => {
      const failingQuietly = createDeps({
        runFormatCheck: vi.fn(async () => ({ output: '', exitCode: 2, timedOut: false })),
      });
      const printingSuccessfully = createDeps({
        runFormatCheck: vi.fn(async () => ({ output: 'diff\n', exitCode: 0, timedOut: false })),
      });

      expect((await runPrePush(createInput(), failingQuietly)).exitCode).toBe(0);
      expect((await runPrePush(createInput(), printingSuccessfully)).exitCode).toBe(1);
    });

    it('treats output of only newlines as clean', async () => {
      const deps = createDeps({
        runFormatCheck: vi.fn(async () => ({ output: '\n\n', exitCode: 0, timedOut: false })),
      });

      const result = await runPrePush(createInput(), deps);

      expect(result.exitCode).toBe(0);
      expect(result.outcome).toBe('clean');
      expect(result.stdout).toBe('');
    });

    it('blocks the push when the output is blanks before a newline', async () => {
      const deps = createDeps({
        runFormatCheck: vi.fn(async () => ({ output: '  \n', exitCode: 0, timedOut: false })),
      });

      const result = await runPrePush(createInput(), deps);

      expect(result.exitCode).toBe(1);
      expect(result.outcome).toBe('issues-found');
      expect(result.issues).toBe('  ');
      expect(result.stdout).toBe(
        'Format Error detected:\n\n  \n\nPlease run `make format` before next push.\n'
      );
    });

    it('uses the configured fix hint and commands', async () => {
      const config = {
        ...getDefaultConfig(),
        styleChecker: 'prettier',
        formatterProbe: ['prettier', '--version'],
        formatCheck: ['npm', 'run', 'format:check'],
        fixHint: 'npm run format',
        timeout: 5000,
      };
      const deps = createDeps({
        runFormatCheck: vi.fn(async () => ({ output: 'src/a.ts\n', exitCode: 1, timedOut: false })),
      });

      const result = await runPrePush(createInput({ config }), deps);

      expect(deps.isCommandAvailable).toHaveBeenCalledWith('prettier');
      expect(deps.runFormatCheck).toHaveBeenCalledWith(['npm', 'run', 'format:check'], {
        cwd: '/work/repo',
        timeout: 5000,
      });
      expect(result.stdout).toBe(
        'Format Error detected:\n\nsrc/a.ts\n\nPlease run `npm run format` before next push.\n'
      );
    });
  });

  describe('soft failures', () => {
    it('allows the push when the check times out', async () => {
      const deps = createDeps({
        runFormatCheck: vi.fn(async () => ({ output: 'partial', exitCode: null, timedOut: true })),
      });

      const result = await runPrePush(createInput(), deps);

      expect(result.exitCode).toBe(0);
      expect(result.outcome).toBe('check-timed-out');
      expect(result.stdout).toBe(
        'Warning: `make format-check` timed out after 300000ms. Skipping format check.\n'
      );
    });

    it('allows the push when the check cannot be started', async () => {
      const deps = createDeps({
        runFormatCheck: vi.fn(async () => {
          throw new ToolInvocationError('Failed to run make format-check: spawn make ENOENT', {
            command: 'make format-check',
          });
        }),
      });

      const result = await runPrePush(createInput(), deps);

      expect(result.exitCode).toBe(0);
      expect(result.outcome).toBe('check-failed-to-run');
      expect(result.stdout).toBe(
        'Warning: could not run `make format-check` (Failed to run make format-check: spawn make ENOENT). Skipping format check.\n'
      );
    });

    it('skips every step when asked to', async () => {
      const deps = createDeps();

      const result = await runPrePush(createInput({ skip: true }), deps);

      expect(result).toEqual({ exitCode: 0, outcome: 'skipped', stdout: '' });
      expect(deps.isCommandAvailable).not.toHaveBeenCalled();
      expect(deps.runFormatCheck).not.toHaveBeenCalled();
    });
  });

  it('accepts ref updates without acting on them', async () => {
    const deps = createDeps();
    const result = await runPrePush(
      createInput({
        refs: [
          {
            localRef: 'refs/heads/main',
            localSha: 'a'.repeat(40),
            remoteRef: 'refs/heads/main',
            remoteSha: 'b'.repeat(40),
            kind: 'update',
          },
        ],
      }),
      deps
    );
    expect(result.outcome).toBe('clean');
  });
});
