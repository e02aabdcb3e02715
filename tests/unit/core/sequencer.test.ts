import { describe, expect, it, vi } from 'vitest';
import {
  BootstrapSequencer,
  exitCodeFor,
  failed,
  succeeded,
  type Step,
  type StepOutcome,
} from '../../../src/core/sequencer.js';
import { SequenceError } from '../../../src/core/errors.js';

interface TestContext {
  calls: string[];
}

const CANONICAL = [
  'install',
  'collect-assets',
  'migrate',
  'init-platform-settings',
  'init-referral-settings',
];

function makeSteps(
  outcomes: Partial<Record<string, StepOutcome | Error>> = {},
  names: string[] = CANONICAL,
): Step<TestContext>[] {
  return names.map((name, position) => ({
    name,
    label: name,
    position,
    action: async (ctx: TestContext) => {
      ctx.calls.push(`start:${name}`);
      await Promise.resolve();
      const outcome = outcomes[name] ?? succeeded;
      if (outcome instanceof Error) throw outcome;
      ctx.calls.push(`end:${name}`);
      return outcome;
    },
  }));
}

describe('BootstrapSequencer', () => {
  it('runs every step in order and completes (happy path)', async () => {
    const ctx: TestContext = { calls: [] };
    const sequencer = new BootstrapSequencer<TestContext>(makeSteps());

    const result = await sequencer.run(ctx);

    expect(result.status).toBe('completed');
    expect(result.reports.map((r) => r.name)).toEqual(CANONICAL);
    expect(result.reports.every((r) => r.ok)).toBe(true);
    expect(exitCodeFor(result)).toBe(0);
    expect(sequencer.state).toEqual({ kind: 'completed' });
  });

  it('finishes each step before the next one starts', async () => {
    const ctx: TestContext = { calls: [] };
    await new BootstrapSequencer<TestContext>(makeSteps()).run(ctx);

    expect(ctx.calls).toEqual(CANONICAL.flatMap((name) => [`start:${name}`, `end:${name}`]));
  });

  it('aborts at a failing migration and never runs the settings steps', async () => {
    const ctx: TestContext = { calls: [] };
    const sequencer = new BootstrapSequencer<TestContext>(
      makeSteps({ migrate: failed('pending conflicting migration') }),
    );

    const result = await sequencer.run(ctx);

    expect(result).toEqual({
      status: 'aborted',
      step: 'migrate',
      index: 2,
      cause: { message: 'pending conflicting migration' },
      reports: expect.any(Array),
    });
    expect(ctx.calls).not.toContain('start:init-platform-settings');
    expect(ctx.calls).not.toContain('start:init-referral-settings');
    expect(exitCodeFor(result)).toBe(1);
    expect(sequencer.state).toEqual({
      kind: 'aborted',
      index: 2,
      cause: { message: 'pending conflicting migration' },
    });
  });

  it('aborts at the first step without invoking any other collaborator', async () => {
    const ctx: TestContext = { calls: [] };
    const actions = makeSteps({ install: failed('package not found') }).map((step) => ({
      ...step,
      action: vi.fn(step.action),
    }));

    const result = await new BootstrapSequencer<TestContext>(actions).run(ctx);

    expect(result.status).toBe('aborted');
    if (result.status !== 'aborted') return;
    expect(result.step).toBe('install');
    expect(result.index).toBe(0);
    expect(result.cause.message).toBe('package not found');
    expect(actions[0]?.action).toHaveBeenCalledTimes(1);
    for (const step of actions.slice(1)) {
      expect(step.action).not.toHaveBeenCalled();
    }
  });

  it('reaches completed when the whole sequence is rerun after a fix', async () => {
    const first: TestContext = { calls: [] };
    const broken = await new BootstrapSequencer<TestContext>(
      makeSteps({ migrate: failed('pending conflicting migration') }),
    ).run(first);
    expect(broken.status).toBe('aborted');

    const second: TestContext = { calls: [] };
    const fixed = await new BootstrapSequencer<TestContext>(makeSteps()).run(second);

    expect(fixed.status).toBe('completed');
    expect(second.calls[0]).toBe('start:install');
    expect(second.calls.filter((c) => c.startsWith('start:'))).toHaveLength(5);
  });

  it('stops after any failing position', async () => {
    for (const [k, name] of CANONICAL.entries()) {
      const ctx: TestContext = { calls: [] };
      const result = await new BootstrapSequencer<TestContext>(
        makeSteps({ [name]: failed(`broken ${name}`) }),
      ).run(ctx);

      expect(result.status).toBe('aborted');
      expect(result.reports).toHaveLength(k + 1);
      const started = ctx.calls.filter((c) => c.startsWith('start:'));
      expect(started).toEqual(CANONICAL.slice(0, k + 1).map((n) => `start:${n}`));
    }
  });

  it('treats a thrown error as a failure of that step', async () => {
    const ctx: TestContext = { calls: [] };
    const result = await new BootstrapSequencer<TestContext>(
      makeSteps({ 'collect-assets': new Error('EACCES: permission denied') }),
    ).run(ctx);

    expect(result.status).toBe('aborted');
    if (result.status !== 'aborted') return;
    expect(result.step).toBe('collect-assets');
    expect(result.index).toBe(1);
    expect(result.cause).toEqual({ message: 'EACCES: permission denied' });
    expect(ctx.calls).not.toContain('start:migrate');
  });

  it('keeps the diagnostics the collaborator reported', async () => {
    const cause = { message: 'npm ci exited with code 1', exitCode: 1, output: 'E404 Not Found' };
    const result = await new BootstrapSequencer<TestContext>(
      makeSteps({ install: failed(cause) }),
    ).run({ calls: [] });

    expect(result.status === 'aborted' && result.cause).toEqual(cause);
  });

  it('reports progress to the listener', async () => {
    const events: string[] = [];
    const sequencer = new BootstrapSequencer<TestContext>(
      makeSteps({ migrate: failed('boom') }),
      {
        onStepStart: (step) => events.push(`start ${step.name}`),
        onStepSucceeded: (step) => events.push(`ok ${step.name}`),
        onStepFailed: (step, cause) => events.push(`fail ${step.name}: ${cause.message}`),
      },
    );

    await sequencer.run({ calls: [] });

    expect(events).toEqual([
      'start install',
      'ok install',
      'start collect-assets',
      'ok collect-assets',
      'start migrate',
      'fail migrate: boom',
    ]);
  });

  it('finishes the run when a listener throws', async () => {
    const warning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});
    const ctx: TestContext = { calls: [] };
    const sequencer = new BootstrapSequencer<TestContext>(makeSteps(), {
      onStepStart: (step) => {
        if (step.name === 'migrate') throw new Error('render failed');
      },
    });

    const result = await sequencer.run(ctx);

    expect(result.status).toBe('completed');
    expect(sequencer.state).toEqual({ kind: 'completed' });
    expect(ctx.calls).toContain('end:init-referral-settings');
    expect(warning).toHaveBeenCalledWith(
      'Bootstrap listener onStepStart threw: render failed',
      'BootstrapListenerWarning',
    );
    warning.mockRestore();
  });

  it('is running at the current index while a step is in flight', async () => {
    const seen: unknown[] = [];
    let sequencer: BootstrapSequencer<TestContext> | undefined;
    const steps: Step<TestContext>[] = ['a', 'b'].map((name, position) => ({
      name,
      label: name,
      position,
      action: async () => {
        seen.push(sequencer?.state);
        return succeeded;
      },
    }));
    sequencer = new BootstrapSequencer<TestContext>(steps);

    expect(sequencer.state).toEqual({ kind: 'not-started' });
    await sequencer.run({ calls: [] });

    expect(seen).toEqual([
      { kind: 'running', index: 0 },
      { kind: 'running', index: 1 },
    ]);
  });

  it('runs only once per instance', async () => {
    const sequencer = new BootstrapSequencer<TestContext>(makeSteps());
    await sequencer.run({ calls: [] });

    await expect(sequencer.run({ calls: [] })).rejects.toThrow(SequenceError);
  });

  it('rejects an empty sequence', () => {
    expect(() => new BootstrapSequencer<TestContext>([])).toThrow(SequenceError);
  });
});
