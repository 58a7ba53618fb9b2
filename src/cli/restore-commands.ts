import { type Command } from 'commander';

import { createPrompter } from '../prompt.js';
import { runInteractiveRestore } from '../restore/interactive.js';
import { quickRestore } from '../restore/restore.js';
import { createSelector } from '../selector/index.js';

import { log, openSession, wrapAction } from './shared.js';

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export async function handleInteractive(opts: Record<string, unknown>): Promise<void> {
  const { client } = await openSession(opts);
  const prompter = createPrompter();
  const selector = await createSelector({ prompter, disableFzf: opts['fzf'] === false });
  const result = await runInteractiveRestore({ client, selector, prompter });
  if (result?.restored === true) {
    log('Restore complete.');
  }
}

async function handleQuick(
  snapshotId: string,
  target: string | undefined,
  _opts: Record<string, unknown>,
  command: Command,
): Promise<void> {
  const { client } = await openSession(command.optsWithGlobals());
  await quickRestore(client, snapshotId, target);
  log('Restore complete.');
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerRestoreCommands(program: Command): void {
  program
    .command('quick')
    .description('Restore an entire snapshot without prompts')
    .argument('<snapshot-id>', 'snapshot to restore')
    .argument('[target]', 'directory to restore into (default: current directory)')
    .action(wrapAction(handleQuick));
}
