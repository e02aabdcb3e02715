import { SequenceError, errorMessage } from './errors.js';

/**
 * Diagnostics a collaborator produced when its step failed.
 */
export interface FailureCause {
  message: string;
  exitCode?: number;
  signal?: string;
  timedOut?: boolean;
  /** Last lines of the collaborator's output. */
  output?: string;
}

export type StepOutcome =
  | { ok: true }
  | { ok: false; cause: FailureCause };

export interface Step<C> {
  name: string;
  label: string;
  position: number;
  action: (context: C) => Promise<StepOutcome>;
}

export interface StepReport {
  name: string;
  position: number;
  ok: boolean;
  durationMs: number;
}

export type RunResult =
  | { status: 'completed'; reports: StepReport[] }
  | {
      status: 'aborted';
      step: string;
      index: number;
      cause: FailureCause;
      reports: StepReport[];
    };

export type SequencerState =
  | { kind: 'not-started' }
  | { kind: 'running'; index: number }
  | { kind: 'completed' }
  | { kind: 'aborted'; index: number; cause: FailureCause };

/**
 * Progress hooks. Called synchronously; they observe the run and
 * cannot change its course. A hook that throws is reported as a
 * process warning and the run carries on.
 */
export interface SequenceListener<S> {
  onStepStart?: (step: S) => void;
  onStepSucceeded?: (step: S, durationMs: number) => void;
  onStepFailed?: (step: S, cause: FailureCause, durationMs: number) => void;
}

export const succeeded: StepOutcome = { ok: true };

export function failed(cause: FailureCause | string): StepOutcome {
  return { ok: false, cause: typeof cause === 'string' ? { message: cause } : cause };
}

/**
 * Runs an ordered list of steps one at a time and stops at the first failure.
 *
 * Ordering is taken as given; the sequencer does not infer dependencies
 * between steps. Nothing is retried or rolled back: a failed run is
 * recovered by fixing the cause and running a new sequencer from the top,
 * so every step must be safe to run again.
 *
 * One instance runs once. It moves from `not-started` through `running(i)`
 * to either `completed` or `aborted(i)` and never leaves a terminal state.
 */
export class BootstrapSequencer<C, S extends Step<C> = Step<C>> {
  private readonly steps: readonly S[];
  private readonly listener: SequenceListener<S>;
  private current: SequencerState = { kind: 'not-started' };

  constructor(steps: readonly S[], listener: SequenceListener<S> = {}) {
    if (steps.length === 0) {
      throw new SequenceError('Cannot run an empty bootstrap sequence');
    }
    this.steps = [...steps];
    this.listener = listener;
  }

  get state(): SequencerState {
    return this.current;
  }

  async run(context: C): Promise<RunResult> {
    if (this.current.kind !== 'not-started') {
      throw new SequenceError(
        `Sequencer already ${this.current.kind}; start a new sequencer to run again`,
      );
    }

    const reports: StepReport[] = [];

    for (const [index, step] of this.steps.entries()) {
      this.current = { kind: 'running', index };
      this.notify('onStepStart', () => this.listener.onStepStart?.(step));

      const started = Date.now();
      const outcome = await invoke(step, context);
      const durationMs = Date.now() - started;

      reports.push({ name: step.name, position: step.position, ok: outcome.ok, durationMs });

      if (!outcome.ok) {
        this.current = { kind: 'aborted', index, cause: outcome.cause };
        this.notify('onStepFailed', () => this.listener.onStepFailed?.(step, outcome.cause, durationMs));
        return { status: 'aborted', step: step.name, index, cause: outcome.cause, reports };
      }

      this.notify('onStepSucceeded', () => this.listener.onStepSucceeded?.(step, durationMs));
    }

    this.current = { kind: 'completed' };
    return { status: 'completed', reports };
  }

  private notify(hook: keyof SequenceListener<S>, call: () => void): void {
    try {
      call();
    } catch (err) {
      process.emitWarning(`Bootstrap listener ${hook} threw: ${errorMessage(err)}`, 'BootstrapListenerWarning');
    }
  }
}

// An action that throws is a failed step like any other.
async function invoke<C>(step: Step<C>, context: C): Promise<StepOutcome> {
  try {
    return await step.action(context);
  } catch (err) {
    return failed(errorMessage(err));
  }
}

/**
 * Process exit status for a run result.
 */
export function exitCodeFor(result: RunResult): number {
  return result.status === 'completed' ? 0 : 1;
}
