import type { BootstrapConfig, CommandSpec } from './config.js';
import type { ExecutionContext } from './context.js';
import type { Step, StepOutcome } from './sequencer.js';
import { STEP_LABELS, STEP_NAMES, type StepName } from './step-names.js';

export type CommandRunner = (spec: CommandSpec, context: ExecutionContext) => Promise<StepOutcome>;

export type BootstrapStep = Step<ExecutionContext> & { name: StepName; command: CommandSpec };

/**
 * Build the bootstrap sequence from configuration. The order is always
 * the canonical one; configuration only decides what each step runs.
 */
export function buildSequence(config: BootstrapConfig, runner: CommandRunner): BootstrapStep[] {
  return STEP_NAMES.map((name, position) => {
    const command = config.steps[name];
    return {
      name,
      label: STEP_LABELS[name],
      position,
      command,
      action: (context: ExecutionContext) => runner(command, context),
    };
  });
}
