import { loadConfig, type BootstrapConfig } from '../core/config.js';
import { createContext, type ExecutionContext } from '../core/context.js';
import { errorMessage } from '../core/errors.js';
import { buildSequence, type BootstrapStep } from '../core/steps.js';
import { runCommand } from '../collaborators/command.js';

export type Session =
  | { ok: true; config: BootstrapConfig; context: ExecutionContext; steps: BootstrapStep[] }
  | { ok: false; error: string };

/**
 * Resolve config, context and steps for the TUI. Child output is captured,
 * since streaming it would tear through the rendered screen.
 */
export function loadSession(cwd: string = process.cwd()): Session {
  try {
    const config = loadConfig(cwd);
    const context = createContext(config, { cwd, output: 'capture' });
    return { ok: true, config, context, steps: buildSequence(config, runCommand) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}
