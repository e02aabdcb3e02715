import chalk from 'chalk';
import { configExists, getConfigPath } from '../core/config.js';
import { resolveEnvironment } from '../core/context.js';
import { STEP_LABELS, STEP_NAMES } from '../core/step-names.js';
import { describeCommand } from '../collaborators/command.js';
import { header, info, sectionTitle, tableRow } from '../ui/format.js';
import { CONFIG_ERROR_EXIT_CODE, loadConfigOrReport } from './load.js';

/**
 * Plan command — print the sequence that `run` would execute. Runs nothing.
 */
export function planCommand(options?: { cwd?: string }): number {
  const cwd = options?.cwd ?? process.cwd();

  console.log(header('Deploy Bootstrap — Plan (dry run)'));

  const config = loadConfigOrReport(cwd);
  if (!config) return CONFIG_ERROR_EXIT_CODE;

  console.log(tableRow('Environment', resolveEnvironment(config, process.env)));
  console.log(tableRow('Config', configExists(cwd) ? getConfigPath(cwd) : 'defaults'));
  console.log(tableRow('Env files', config.envFiles.join(', ') || '(none)'));

  console.log(sectionTitle('Steps'));
  STEP_NAMES.forEach((name, i) => {
    const spec = config.steps[name];
    console.log(`  ${chalk.dim(`${i + 1}.`)} ${chalk.bold(STEP_LABELS[name])} ${chalk.dim(`(${name})`)}`);
    console.log(info(`   $ ${describeCommand(spec)}`));
    if (spec.cwd) console.log(info(`   cwd: ${spec.cwd}`));
    if (spec.timeoutMs) console.log(info(`   timeout: ${spec.timeoutMs}ms`));
  });
  console.log('');
  console.log(info('Nothing was executed.'));
  console.log('');

  return 0;
}
