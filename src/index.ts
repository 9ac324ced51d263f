import { Command, InvalidArgumentError } from 'commander';
import { generateCommand } from './commands/generate.js';
import { syncCommand } from './commands/sync.js';
import { watchCommand } from './commands/watch.js';
import { teamsCommand } from './commands/teams.js';
import { projectsCommand } from './commands/projects.js';
import { createCommand } from './commands/create.js';
import {
  currentClearCommand,
  currentCustomCommand,
  currentMoveCommand,
  currentSetCommand,
  currentShowCommand,
} from './commands/current.js';
import { configSetCommand, configShowCommand } from './commands/config.js';
import { getErrorMessage } from './utils/errors.js';
import { logger, setVerbose } from './utils/logger.js';

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Wrap a command so failures are logged and turn into a non-zero exit code.
 */
function run<A extends unknown[]>(fn: (...args: A) => Promise<unknown>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      logger.error(getErrorMessage(err));
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('task-header')
  .description('Mirror Linear issues into a markdown checklist and sync checkbox edits back')
  .version('0.1.0')
  .option('--verbose', 'Print debug output')
  .hook('preAction', (command) => {
    if (command.opts().verbose) setVerbose(true);
  });

program
  .command('generate')
  .description('Write a markdown checklist of issues (yours by default)')
  .option('--team <team>', 'Team id, key or name')
  .option('--project <project>', 'Project id or name (needs --team)')
  .option('--limit <n>', 'Maximum number of issues (default: 50)', parseNonNegativeInt)
  .option('--out <dir>', 'Output directory (default: markdownOutputDir)')
  .action(run(async (opts: { team?: string; project?: string; limit?: number; out?: string }) => {
    await generateCommand(opts);
  }));

program
  .command('sync')
  .description('Push checkbox changes in a markdown file to Linear once')
  .argument('<file>', 'Markdown file written by `generate`')
  .option('--concurrency <n>', 'Issues reconciled in parallel (default: 1)', parseNonNegativeInt)
  .option('--quiet', 'Suppress the summary')
  .action(run(async (file: string, opts: { concurrency?: number; quiet?: boolean }) => {
    await syncCommand(file, opts);
  }));

program
  .command('watch')
  .description('Watch a markdown file and sync checkbox changes as they are saved')
  .argument('[file]', 'Markdown file written by `generate` (default: my-issues.md in markdownOutputDir)')
  .option('--debounce <ms>', 'Debounce interval in ms (default: 500)', parseNonNegativeInt)
  .action(run(async (file: string | undefined, opts: { debounce?: number }) => {
    await watchCommand(file, opts);
  }));

program
  .command('teams')
  .description('List teams visible to the API key')
  .action(run(teamsCommand));

program
  .command('projects')
  .description('List the projects of a team')
  .requiredOption('--team <team>', 'Team id, key or name')
  .action(run(async (opts: { team: string }) => {
    await projectsCommand(opts);
  }));

program
  .command('create')
  .description('Create an issue')
  .requiredOption('--team <team>', 'Team id, key or name')
  .requiredOption('--title <title>', 'Issue title')
  .option('--description <text>', 'Issue description')
  .action(run(async (opts: { team: string; title: string; description?: string }) => {
    await createCommand(opts);
  }));

const current = program
  .command('current')
  .description('Show or change the issue pinned to the header')
  .action(run(currentShowCommand));

current
  .command('show')
  .description('Show the current issue')
  .action(run(currentShowCommand));

current
  .command('set')
  .description('Pin an issue to the header')
  .argument('<id>', 'Issue id or identifier (e.g. ENG-123)')
  .action(run(async (id: string) => {
    await currentSetCommand(id);
  }));

current
  .command('custom')
  .description('Show free text in the header instead of an issue')
  .argument('<text>', 'Task description')
  .action(run(async (text: string) => {
    await currentCustomCommand(text);
  }));

current
  .command('clear')
  .description('Unpin the current issue')
  .action(run(currentClearCommand));

current
  .command('move')
  .description('Move the current issue to another workflow state')
  .argument('<state>', 'Workflow state name, e.g. "In Progress"')
  .action(run(async (state: string) => {
    await currentMoveCommand(state);
  }));

const config = program
  .command('config')
  .description('Show or change configuration')
  .action(run(configShowCommand));

config
  .command('show')
  .description('Print the configuration')
  .action(run(configShowCommand));

config
  .command('set')
  .description('Set a configuration value')
  .argument('<key>', 'Config key, e.g. syncOnEdit')
  .argument('<value>', 'New value')
  .action(run(async (key: string, value: string) => {
    await configSetCommand(key, value);
  }));

export function main(argv: string[] = process.argv): void {
  program.parseAsync(argv).catch((err: unknown) => {
    logger.error(getErrorMessage(err));
    process.exitCode = 1;
  });
}
