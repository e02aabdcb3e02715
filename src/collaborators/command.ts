import { execa, ExecaError } from 'execa';
import { existsSync } from 'fs';
import { resolve } from 'path';
import type { CommandSpec } from '../core/config.js';
import type { ExecutionContext } from '../core/context.js';
import { failed, succeeded, type FailureCause, type StepOutcome } from '../core/sequencer.js';

const OUTPUT_TAIL_LINES = 20;

/**
 * Printable form of a command, quoting arguments that contain spaces.
 */
export function describeCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...spec.args]
    .map((part) => (/\s/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/**
 * Run one collaborator command to completion.
 *
 * stdin is closed so a command that wants to prompt fails rather than
 * waiting forever. In `stream` mode output goes to the terminal and is
 * captured as well; in `capture` mode it is only captured.
 */
export async function runCommand(spec: CommandSpec, context: ExecutionContext): Promise<StepOutcome> {
  const output = context.output === 'stream' ? (['pipe', 'inherit'] as const) : ('pipe' as const);
  const cwd = spec.cwd ? resolve(context.cwd, spec.cwd) : context.cwd;

  // spawn reports a missing cwd as ENOENT against the command itself.
  if (!existsSync(cwd)) {
    return failed(`${describeCommand(spec)} not started: working directory ${cwd} does not exist`);
  }

  try {
    await execa(spec.command, spec.args, {
      cwd,
      env: { ...context.env, ...spec.env },
      extendEnv: false,
      stdin: 'ignore',
      stdout: output,
      stderr: output,
      all: true,
      timeout: spec.timeoutMs,
    });
    return succeeded;
  } catch (err) {
    if (err instanceof ExecaError) {
      return failed(causeFromError(spec, err));
    }
    throw err;
  }
}

function causeFromError(spec: CommandSpec, err: ExecaError): FailureCause {
  const command = describeCommand(spec);
  const cause: FailureCause = { message: '' };

  if (err.timedOut) {
    cause.message = `${command} timed out after ${spec.timeoutMs ?? 0}ms`;
    cause.timedOut = true;
  } else if (err.signal) {
    cause.message = `${command} was terminated by ${err.signal}`;
  } else if (err.exitCode !== undefined) {
    cause.message = `${command} exited with code ${err.exitCode}`;
  } else {
    cause.message = err.shortMessage.split('\n')[0] ?? command;
  }

  if (err.exitCode !== undefined) cause.exitCode = err.exitCode;
  if (err.signal) cause.signal = err.signal;

  const tail = outputTail(err.all);
  if (tail) cause.output = tail;

  return cause;
}

export function outputTail(all: unknown, lines = OUTPUT_TAIL_LINES): string | undefined {
  if (typeof all !== 'string') return undefined;
  const trimmed = all.trimEnd();
  if (!trimmed) return undefined;
  return trimmed.split('\n').slice(-lines).join('\n');
}
