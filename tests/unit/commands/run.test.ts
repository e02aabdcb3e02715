import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runBootstrapCommand } from '../../../src/commands/run.js';
import { getConfigPath, type CommandSpec } from '../../../src/core/config.js';
import type { ExecutionContext } from '../../../src/core/context.js';
import { failed, succeeded, type StepOutcome } from '../../../src/core/sequencer.js';

describe('runBootstrapCommand', () => {
  let dir: string;
  let lines: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bootstrap-run-'));
    lines = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      lines.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function printed(text: string): boolean {
    return lines.some((line) => line.includes(text));
  }

  function runnerFailingAt(script: string | null, cause = 'pending conflicting migration') {
    return vi.fn(async (spec: CommandSpec, _context: ExecutionContext): Promise<StepOutcome> => {
      if (!spec.args.includes(script ?? '')) return succeeded;
      return failed({ message: cause, exitCode: 1, output: 'migration 0007 conflicts' });
    });
  }

  it('runs all five steps and exits 0', async () => {
    const runner = runnerFailingAt(null);

    const code = await runBootstrapCommand({ cwd: dir, runner });

    expect(code).toBe(0);
    expect(runner.mock.calls.map(([spec]) => spec.args.join(' '))).toEqual([
      'ci',
      'run assets:collect',
      'run db:migrate',
      'run settings:init-platform',
      'run settings:init-referral',
    ]);
    expect(runner.mock.calls[0]?.[1].cwd).toBe(dir);
    expect(printed('Bootstrap complete (5 steps')).toBe(true);
  });

  it('stops at the failing migration and exits 1', async () => {
    const runner = runnerFailingAt('db:migrate');

    const code = await runBootstrapCommand({ cwd: dir, runner });

    expect(code).toBe(1);
    expect(runner).toHaveBeenCalledTimes(3);
    expect(printed('Bootstrap aborted at step 3/5: Apply schema migrations')).toBe(true);
    expect(printed('pending conflicting migration')).toBe(true);
    expect(printed('exit code: 1')).toBe(true);
    expect(printed('Initialize referral settings')).toBe(true);
    // Streamed output was already visible, so the tail is not repeated.
    expect(printed('migration 0007 conflicts')).toBe(false);
  });

  it('prints the captured output tail in quiet mode', async () => {
    const runner = runnerFailingAt('db:migrate');

    const code = await runBootstrapCommand({ cwd: dir, runner, quiet: true });

    expect(code).toBe(1);
    expect(printed('Output (last lines)')).toBe(true);
    expect(printed('migration 0007 conflicts')).toBe(true);
  });

  it('completes on a rerun once the cause is fixed', async () => {
    const broken = runnerFailingAt('db:migrate');
    expect(await runBootstrapCommand({ cwd: dir, runner: broken })).toBe(1);

    const fixed = runnerFailingAt(null);
    expect(await runBootstrapCommand({ cwd: dir, runner: fixed })).toBe(0);

    expect(fixed).toHaveBeenCalledTimes(5);
    expect(fixed.mock.calls[0]?.[0].args).toEqual(['ci']);
  });

  it('runs nothing and exits 2 on invalid configuration', async () => {
    writeFileSync(getConfigPath(dir), JSON.stringify({ steps: { deploy: {} } }));
    const runner = runnerFailingAt(null);

    const code = await runBootstrapCommand({ cwd: dir, runner });

    expect(code).toBe(2);
    expect(runner).not.toHaveBeenCalled();
    expect(printed('Invalid configuration')).toBe(true);
  });
});
