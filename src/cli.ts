import { Command } from 'commander';

import { registerInfoCommands } from './cli/info-commands.js';
import { handleInteractive, registerRestoreCommands } from './cli/restore-commands.js';
import { status, wrapAction } from './cli/shared.js';
import { DEFAULT_ENV_FILE, VERSION } from './types.js';

const EXAMPLES = `
Examples:
  $ restic-browse                            browse snapshots and pick files to restore
  $ restic-browse quick abc123               restore snapshot abc123 into the current directory
  $ restic-browse quick abc123 ~/restored    restore snapshot abc123 into ~/restored`;

/**
 * Builds the command tree. Without arguments the program runs the
 * interactive browser; `help` prints usage and any other word is rejected.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('restic-browse')
    .description('Browse restic snapshots and restore selected files')
    .version(VERSION)
    .option('--config <path>', 'restic env file written by the setup script', DEFAULT_ENV_FILE)
    .option('--no-fzf', 'use the numbered list even when fzf is installed')
    .usage('[options] [command]')
    .argument('[command]')
    .addHelpText('after', EXAMPLES)
    .action(
      wrapAction(async (command: string | undefined, opts: Record<string, unknown>) => {
        if (command === undefined) {
          await handleInteractive(opts);
          return;
        }
        if (command === 'help') {
          program.outputHelp();
          return;
        }
        status(`Unknown command: ${command}`);
        program.outputHelp({ error: true });
        process.exitCode = 1;
      }),
    );

  registerRestoreCommands(program);
  registerInfoCommands(program);
  return program;
}

/** Parses `argv` (as found in process.argv) and runs the matching command. */
export async function run(argv: readonly string[]): Promise<void> {
  await createProgram().parseAsync([...argv]);
}
