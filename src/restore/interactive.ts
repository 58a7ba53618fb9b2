import { browseSnapshot } from '../browser/browser.js';
import { selectSnapshot } from '../snapshots.js';
import { type Prompter, type ResticClient, type RestoreResult, type Selector } from '../types.js';

import { executeRestore } from './restore.js';

export interface InteractiveDeps {
  client: ResticClient;
  selector: Selector;
  prompter: Prompter;
}

/**
 * Snapshot pick → directory browse → confirmed restore. Resolves to null
 * when the user backed out before the restore prompts.
 */
export async function runInteractiveRestore(deps: InteractiveDeps): Promise<RestoreResult | null> {
  const snapshotId = await selectSnapshot(deps.client, deps.selector);
  if (snapshotId === null) {
    console.error('No snapshot selected.');
    return null;
  }
  console.error(`Selected snapshot: ${snapshotId}`);

  const outcome = await browseSnapshot(deps, snapshotId);
  if (outcome.kind === 'cancelled') {
    return null;
  }
  return executeRestore(deps, snapshotId, outcome.paths);
}
