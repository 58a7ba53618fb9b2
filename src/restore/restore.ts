import { mkdir } from 'node:fs/promises';

import { wrapError } from '../errors.js';
import { ROOT_PATH, type Prompter, type ResticClient, type RestoreResult } from '../types.js';
import { resolveTarget } from '../utils.js';

// ---------------------------------------------------------------------------
// Internal types
// ---------------------------------------------------------------------------

export interface RestoreDeps {
  client: ResticClient;
  prompter: Prompter;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function printOutput(stdout: string): void {
  const trimmed = stdout.trim();
  if (trimmed.length > 0) {
    console.error(trimmed);
  }
}

/**
 * Asks where to restore. Resolves to `/` for the original locations, to an
 * existing absolute directory otherwise, or to null when the user gave no
 * directory.
 */
async function chooseTarget(prompter: Prompter): Promise<string | null> {
  const original = await prompter.confirm('Restore to original locations?', true);
  if (original === undefined) {
    return null;
  }
  if (original) {
    return ROOT_PATH;
  }
  const answer = (await prompter.text('Enter target directory'))?.trim();
  if (answer === undefined || answer.length === 0) {
    return null;
  }
  const target = resolveTarget(answer);
  try {
    await mkdir(target, { recursive: true });
  } catch (err) {
    throw wrapError(`Failed to create target directory ${target}`, err);
  }
  return target;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Confirms and restores the selected paths of one snapshot. Declining any
 * prompt ends with `restored: false`; restic failures propagate.
 */
export async function executeRestore(
  deps: RestoreDeps,
  snapshotId: string,
  paths: readonly string[],
): Promise<RestoreResult> {
  if (paths.length === 0) {
    throw new Error('Nothing to restore: no paths selected');
  }
  console.error('');
  console.error('Items to restore:');
  for (const p of paths) {
    console.error(`  ${p}`);
  }
  console.error('');

  const target = await chooseTarget(deps.prompter);
  if (target === null) {
    console.error('Cancelled.');
    return { restored: false, snapshotId, paths };
  }

  const confirmed = await deps.prompter.confirm('Proceed with restore?', false);
  if (confirmed !== true) {
    console.error('Cancelled.');
    return { restored: false, snapshotId, paths };
  }

  console.error('Restoring...');
  printOutput(await deps.client.restore(snapshotId, { target, include: paths }));
  return { restored: true, snapshotId, target, paths };
}

/**
 * Restores a whole snapshot into `target` (default: the working directory)
 * without asking anything.
 */
export async function quickRestore(
  client: ResticClient,
  snapshotId: string,
  target = '.',
): Promise<RestoreResult> {
  const resolved = resolveTarget(target);
  console.error(`Restoring snapshot ${snapshotId} to ${resolved}...`);
  printOutput(await client.restore(snapshotId, { target: resolved }));
  return { restored: true, snapshotId, target: resolved, paths: [] };
}
