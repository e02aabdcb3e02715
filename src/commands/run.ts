import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { configExists, getConfigPath } from '../core/config.js';
import { createContext, type ExecutionContext } from '../core/context.js';
import {
  BootstrapSequencer,
  exitCodeFor,
  type RunResult,
  type SequenceListener,
} from '../core/sequencer.js';
import { buildSequence, type BootstrapStep, type CommandRunner } from '../core/steps.js';
import { describeCommand, runCommand } from '../collaborators/command.js';
import {
  header,
  success,
  error,
  info,
  sectionTitle,
  tableRow,
  formatDuration,
  describeCause,
} from '../ui/format.js';
import { CONFIG_ERROR_EXIT_CODE, loadConfigOrReport } from './load.js';

export interface RunOptions {
  cwd?: string;
  /** Capture collaborator output instead of streaming it; failures still show its tail. */
  quiet?: boolean;
  runner?: CommandRunner;
}

/**
 * Run command — execute the bootstrap sequence and return the process exit code.
 */
export async function runBootstrapCommand(options: RunOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();

  console.log(header('Deploy Bootstrap — Run'));

  const config = loadConfigOrReport(cwd);
  if (!config) return CONFIG_ERROR_EXIT_CODE;

  const context = createContext(config, { cwd, output: options.quiet ? 'capture' : 'stream' });
  const steps = buildSequence(config, options.runner ?? runCommand);

  console.log(tableRow('Environment', context.environment));
  console.log(tableRow('Directory', context.cwd));
  console.log(tableRow('Config', configExists(cwd) ? getConfigPath(cwd) : 'defaults'));

  const listener = options.quiet ? spinnerListener(steps.length) : streamListener(steps.length);
  const sequencer = new BootstrapSequencer<ExecutionContext, BootstrapStep>(steps, listener);
  const result = await sequencer.run(context);

  printSummary(steps, result, options.quiet ?? false);
  return exitCodeFor(result);
}

function counter(step: BootstrapStep, total: number): string {
  return chalk.dim(`[${step.position + 1}/${total}]`);
}

function streamListener(total: number): SequenceListener<BootstrapStep> {
  return {
    onStepStart(step) {
      console.log(sectionTitle(`${counter(step, total)} ${step.label}`));
      console.log(info(`$ ${describeCommand(step.command)}`));
    },
    onStepSucceeded(step, durationMs) {
      console.log(success(`${step.label} (${formatDuration(durationMs)})`));
    },
    onStepFailed(step, _cause, durationMs) {
      console.log(error(`${step.label} failed after ${formatDuration(durationMs)}`));
    },
  };
}

function spinnerListener(total: number): SequenceListener<BootstrapStep> {
  let spinner: Ora | null = null;
  return {
    onStepStart(step) {
      spinner = ora(`${counter(step, total)} ${step.label}`).start();
    },
    onStepSucceeded(step, durationMs) {
      spinner?.succeed(chalk.green(`${step.label} ${chalk.dim(formatDuration(durationMs))}`));
    },
    onStepFailed(step, _cause, durationMs) {
      spinner?.fail(chalk.red(`${step.label} failed after ${formatDuration(durationMs)}`));
    },
  };
}

function printSummary(steps: BootstrapStep[], result: RunResult, quiet: boolean): void {
  console.log('');

  if (result.status === 'completed') {
    const total = result.reports.reduce((sum, r) => sum + r.durationMs, 0);
    console.log(success(`Bootstrap complete (${steps.length} steps, ${formatDuration(total)})`));
    for (const report of result.reports) {
      console.log(tableRow(report.name, formatDuration(report.durationMs), 24));
    }
    console.log('');
    return;
  }

  const failedStep = steps[result.index];
  const label = failedStep ? failedStep.label : result.step;
  console.log(error(`Bootstrap aborted at step ${result.index + 1}/${steps.length}: ${label}`));
  for (const line of describeCause(result.cause)) {
    console.log(info(line));
  }

  // Streamed output is already on screen.
  if (quiet && result.cause.output) {
    console.log(sectionTitle('Output (last lines)'));
    for (const line of result.cause.output.split('\n')) {
      console.log(info(line));
    }
  }

  const notRun = steps.slice(result.index + 1);
  if (notRun.length > 0) {
    console.log(sectionTitle('Not run'));
    for (const step of notRun) {
      console.log(tableRow(step.name, step.label, 24));
    }
  }

  console.log('');
  console.log(info('Fix the cause and rerun; the sequence starts again from the first step.'));
  console.log('');
}
