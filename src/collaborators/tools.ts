import { execa } from 'execa';
import type { BootstrapConfig } from '../core/config.js';
import { STEP_NAMES, type StepName } from '../core/step-names.js';

export interface ToolStatus {
  command: string;
  steps: StepName[];
  available: boolean;
}

/**
 * Check whether a command can be found on PATH.
 */
export async function isToolAvailable(command: string, env?: Record<string, string>): Promise<boolean> {
  return execa('which', [command], { env, stdout: 'ignore', stderr: 'ignore' })
    .then(() => true)
    .catch(() => false);
}

/**
 * One entry per distinct command the sequence uses, in first-use order.
 */
export async function checkTools(
  config: BootstrapConfig,
  env?: Record<string, string>,
): Promise<ToolStatus[]> {
  const byCommand = new Map<string, StepName[]>();
  for (const name of STEP_NAMES) {
    const { command } = config.steps[name];
    byCommand.set(command, [...(byCommand.get(command) ?? []), name]);
  }

  return Promise.all(
    [...byCommand.entries()].map(async ([command, steps]) => ({
      command,
      steps,
      available: await isToolAvailable(command, env),
    })),
  );
}
