// Command-line surface for vfm

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { newCommand } from './commands/new.js';
import { statsCommand } from './commands/stats.js';
import { searchCommand } from './commands/search.js';
import { isVaultError } from './vault/errors.js';
import { setVerbose, error as logError } from './utils/logger.js';

export const VERSION = '0.2.0';

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

/**
 * Run a command body, mapping failures to an exit code:
 * 1 for vault errors (bad config, unknown space, invalid pattern, ...), 2 otherwise
 */
export function runAction(body: () => void): void {
  try {
    body();
  } catch (err) {
    if (isVaultError(err)) {
      logError(err.message);
      process.exitCode = 1;
      return;
    }
    logError('Unexpected failure:', err);
    process.exitCode = 2;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('vfm')
    .description('Organize Markdown notes into spaces')
    .version(VERSION)
    .option('-c, --config <path>', 'Configuration file (defaults to VFM_CONFIG or ~/.vfm/config.json)')
    .option('-v, --verbose', 'Enable verbose logging')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<GlobalOptions>().verbose) {
        setVerbose(true);
      }
    });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command('init')
    .description('Create the notes root, space directories and configuration')
    .option('--root <path>', 'Root directory for all spaces (defaults to the current directory)')
    .option('--spaces <names>', 'Comma-separated space names')
    .option('--template <file>', 'File whose content becomes the note template')
    .option('--editor <command>', 'Editor command used by `new --open`')
    .action((options: { root?: string; spaces?: string; template?: string; editor?: string }) => {
      runAction(() => {
        initCommand({ ...options, configPath: globals().config });
      });
    });

  program
    .command('new')
    .description('Create a new note')
    .argument('[space-or-path]', 'Space name or path under a space (defaults to the first space)')
    .requiredOption('-t, --title <title>', 'Note title')
    .option('-o, --open', 'Open the new note in the configured editor', false)
    .action((target: string | undefined, options: { title: string; open: boolean }) => {
      runAction(() => {
        newCommand(target, { ...options, configPath: globals().config });
      });
    });

  program
    .command('stats')
    .description('Output statistics: number of notes, most active space, total words')
    .argument('[target]', 'Space name or path under a space (defaults to all spaces)')
    .action((target: string | undefined) => {
      runAction(() => {
        statsCommand(target, { configPath: globals().config });
      });
    });

  program
    .command('search')
    .description('egrep-like search; prints path:line:text for each matching line')
    .usage('[options] [target] <pattern>')
    .argument('<target-or-pattern>', 'Pattern, or a space/path when a pattern follows')
    .argument('[pattern]', 'Regular expression to search for')
    .option('-i, --ignore-case', 'Perform case-insensitive search', false)
    .action((first: string, second: string | undefined, options: { ignoreCase: boolean }) => {
      const target = second === undefined ? undefined : first;
      const pattern = second ?? first;
      runAction(() => {
        searchCommand(target, pattern, { ignoreCase: options.ignoreCase, configPath: globals().config });
      });
    });

  return program;
}

export function runCli(argv: readonly string[] = process.argv): void {
  buildProgram().parse([...argv]);
}
