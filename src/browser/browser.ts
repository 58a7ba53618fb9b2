import { SelectionError } from '../errors.js';
import {
  ROOT_PATH,
  type BrowseOutcome,
  type MenuChoice,
  type ResticClient,
  type Selector,
} from '../types.js';

import { applyChoice, buildMenu, initialState } from './menu.js';

export interface BrowserDeps {
  client: ResticClient;
  selector: Selector;
}

/**
 * Walks the snapshot tree until the user starts a restore or quits. Listing
 * a path that comes back empty sends the user back to `/`; an empty root
 * means there is nothing to browse and fails.
 */
export async function browseSnapshot(deps: BrowserDeps, snapshotId: string): Promise<BrowseOutcome> {
  let state = initialState();

  for (;;) {
    console.error('');
    console.error(`Current path: ${state.currentPath}`);
    console.error(`Selected for restore: ${state.selected.length} items`);
    console.error('');

    const entries = await deps.client.listDirectory(snapshotId, state.currentPath);
    if (entries.length === 0) {
      if (state.currentPath === ROOT_PATH) {
        throw new Error(`Snapshot ${snapshotId} has no entries at ${ROOT_PATH}`);
      }
      console.error('Empty or invalid path.');
      state = { ...state, currentPath: ROOT_PATH };
      continue;
    }

    console.error('Navigate or select items:');
    let choice: MenuChoice | undefined;
    try {
      choice = await deps.selector.selectOne(buildMenu(entries), 'browse>');
    } catch (err) {
      if (err instanceof SelectionError) {
        console.error(`Unknown selection: "${err.input}"`);
        continue;
      }
      throw err;
    }

    if (choice === undefined) {
      console.error('Cancelled.');
      return { kind: 'cancelled' };
    }

    const next = applyChoice(state, choice);
    switch (next.kind) {
      case 'browse':
        if (next.message !== undefined) {
          console.error(next.message);
        }
        state = next.state;
        break;
      case 'restore':
        return { kind: 'restore', paths: next.paths };
      case 'cancel':
        console.error('Cancelled.');
        return { kind: 'cancelled' };
    }
  }
}
