import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { input, select } from '@inquirer/prompts';
import {
  configExists,
  defaultConfig,
  getConfigPath,
  saveConfig,
  type BootstrapConfig,
} from '../core/config.js';
import { STEP_LABELS, STEP_NAMES } from '../core/step-names.js';
import { describeCommand } from '../collaborators/command.js';
import { header, success, warn, info, sectionTitle } from '../ui/format.js';
import { confirmAction, confirmOverwrite } from '../ui/prompts.js';

const GITIGNORE_ENTRIES = ['.env.local'];

/**
 * Update .gitignore in the given directory so local env files stay out of git.
 * Idempotent — only adds entries that are not already present.
 */
export function updateGitignore(dir: string): { added: string[]; alreadyPresent: string[] } {
  const gitignorePath = join(dir, '.gitignore');
  let content = '';

  if (existsSync(gitignorePath)) {
    content = readFileSync(gitignorePath, 'utf-8');
  }

  const lines = content.split('\n');
  const added: string[] = [];
  const alreadyPresent: string[] = [];

  for (const entry of GITIGNORE_ENTRIES) {
    if (lines.some((line) => line.trim() === entry)) {
      alreadyPresent.push(entry);
    } else {
      added.push(entry);
    }
  }

  if (added.length > 0) {
    const suffix = content.endsWith('\n') || content === '' ? '' : '\n';
    writeFileSync(gitignorePath, content + suffix + added.join('\n') + '\n', 'utf-8');
  }

  return { added, alreadyPresent };
}

/**
 * Split a command line typed at a prompt into command and arguments.
 * Double-quoted segments are kept together.
 */
export function splitCommandLine(line: string): { command: string; args: string[] } | null {
  const parts = [...line.matchAll(/"([^"]*)"|(\S+)/g)].map((m) => m[1] ?? m[2] ?? '');
  const [command, ...args] = parts;
  if (!command) return null;
  return { command, args };
}

/**
 * Init command — write a `.bootstrap.json` for this project.
 */
export async function initCommand(options?: { cwd?: string }): Promise<number> {
  const cwd = options?.cwd ?? process.cwd();

  console.log(header('Deploy Bootstrap — Init'));
  console.log('');

  if (configExists(cwd)) {
    console.log(warn(`${getConfigPath(cwd)} already exists.`));
    const overwrite = await confirmOverwrite(getConfigPath(cwd));
    if (!overwrite) {
      console.log(info('Left the existing configuration unchanged.'));
      console.log('');
      return 0;
    }
  }

  const config: BootstrapConfig = defaultConfig();

  const environment = await select({
    message: 'Target environment',
    choices: [
      { name: 'Use BOOTSTRAP_ENV / NODE_ENV at run time', value: '' },
      { name: 'production', value: 'production' },
      { name: 'staging', value: 'staging' },
      { name: 'development', value: 'development' },
    ],
  });
  if (environment) config.environment = environment;

  const customize = await confirmAction('Customize the command for each step?', false);
  if (customize) {
    for (const name of STEP_NAMES) {
      const current = config.steps[name];
      const line = await input({
        message: `${STEP_LABELS[name]}:`,
        default: describeCommand(current),
        validate: (value) => (splitCommandLine(value) ? true : 'Enter a command'),
      });
      const parsed = splitCommandLine(line);
      if (parsed) {
        config.steps[name] = { ...current, ...parsed };
      }
    }
  }

  saveConfig(config, cwd);
  console.log('');
  console.log(success(`Wrote ${getConfigPath(cwd)}`));

  const { added } = updateGitignore(cwd);
  if (added.length > 0) {
    console.log(success(`Added ${added.join(', ')} to .gitignore`));
  }

  console.log(sectionTitle('Next'));
  console.log(info('deploy-bootstrap plan    review the sequence'));
  console.log(info('deploy-bootstrap check   confirm the commands are installed'));
  console.log(info('deploy-bootstrap         run it'));
  console.log('');
  return 0;
}
