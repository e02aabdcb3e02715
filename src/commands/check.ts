import chalk from 'chalk';
import ora from 'ora';
import { createContext } from '../core/context.js';
import { checkTools } from '../collaborators/tools.js';
import { header, success, error, info } from '../ui/format.js';
import { CONFIG_ERROR_EXIT_CODE, loadConfigOrReport } from './load.js';

/**
 * Check command — confirm every step's command can be found before a run.
 */
export async function checkCommand(options?: { cwd?: string }): Promise<number> {
  const cwd = options?.cwd ?? process.cwd();

  console.log(header('Deploy Bootstrap — Check'));
  console.log('');

  const config = loadConfigOrReport(cwd);
  if (!config) return CONFIG_ERROR_EXIT_CODE;

  const context = createContext(config, { cwd, output: 'capture' });

  const spinner = ora('Looking up step commands...').start();
  const tools = await checkTools(config, context.env);
  spinner.stop();

  for (const tool of tools) {
    const usedBy = chalk.dim(`(${tool.steps.join(', ')})`);
    if (tool.available) {
      console.log(success(`${tool.command} ${usedBy}`));
    } else {
      console.log(error(`${tool.command} not found on PATH ${usedBy}`));
    }
  }

  console.log('');
  const missing = tools.filter((t) => !t.available);
  if (missing.length > 0) {
    console.log(info(`${missing.length} command(s) missing; the bootstrap would abort.`));
    console.log('');
    return 1;
  }

  console.log(info('All step commands are available.'));
  console.log('');
  return 0;
}
