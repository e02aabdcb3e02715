import { Command } from 'commander';
import { runBootstrapCommand } from './commands/run.js';
import { planCommand } from './commands/plan.js';
import { checkCommand } from './commands/check.js';
import { initCommand } from './commands/init.js';

interface QuietOption {
  quiet?: boolean;
}

/**
 * Build the command-line program. Only a bare invocation (or `run`)
 * starts the sequence; a stray word such as a mistyped subcommand is
 * rejected instead of being taken as a bare run.
 */
export function buildProgram(): Command {
  const program = new Command();

  program
    .name('deploy-bootstrap')
    .description('Prepare an environment: install, collect assets, migrate, seed settings')
    .version('0.1.0')
    .option('-q, --quiet', 'Capture step output and show it only when a step fails')
    .allowExcessArguments(false)
    .action(async (opts: QuietOption) => {
      process.exitCode = await runBootstrapCommand({ quiet: opts.quiet });
    });

  program
    .command('run')
    .description('Run the bootstrap sequence (default)')
    .option('-q, --quiet', 'Capture step output and show it only when a step fails')
    .action(async (opts: QuietOption) => {
      process.exitCode = await runBootstrapCommand({ quiet: opts.quiet || program.opts<QuietOption>().quiet });
    });

  program
    .command('plan')
    .description('Show the steps and commands a run would execute (dry run)')
    .action(() => {
      process.exitCode = planCommand();
    });

  program
    .command('check')
    .description('Check that every step command is available')
    .action(async () => {
      process.exitCode = await checkCommand();
    });

  program
    .command('init')
    .description('Write a .bootstrap.json for this project')
    .action(async () => {
      process.exitCode = await initCommand();
    });

  program
    .command('tui')
    .description('Interactive terminal UI')
    .action(async () => {
      const { render } = await import('ink');
      const React = await import('react');
      const { App } = await import('./tui/App.js');
      // Enter alternate screen buffer (like vim/htop)
      process.stdout.write('\x1b[?1049h');
      const { waitUntilExit } = render(React.createElement(App));
      await waitUntilExit();
      // Restore normal screen
      process.stdout.write('\x1b[?1049l');
    });

  return program;
}
