import {
  ROOT_PATH,
  type BrowserState,
  type DirectoryEntry,
  type MenuChoice,
  type SelectOption,
  type Transition,
} from '../types.js';
import { joinSnapshotPath, parentPath } from '../utils.js';

export const MENU_ACTIONS: readonly SelectOption<MenuChoice>[] = [
  { label: '[..] Go up', value: { kind: 'up' } },
  { label: '[+] Add current path to restore', value: { kind: 'add-current' } },
  { label: '[>] Restore selected items', value: { kind: 'restore' } },
  { label: '[q] Quit', value: { kind: 'quit' } },
];

export function initialState(): BrowserState {
  return { currentPath: ROOT_PATH, selected: [] };
}

function entryOption(entry: DirectoryEntry): SelectOption<MenuChoice> {
  if (entry.type === 'dir') {
    return { label: `d  ${entry.name}`, value: { kind: 'enter', name: entry.name } };
  }
  return { label: `f  ${entry.name}`, value: { kind: 'add-file', name: entry.name } };
}

/** The fixed actions followed by one option per directory entry. */
export function buildMenu(entries: readonly DirectoryEntry[]): SelectOption<MenuChoice>[] {
  return [...MENU_ACTIONS, ...entries.map(entryOption)];
}

function addPath(state: BrowserState, path: string): Transition {
  return {
    kind: 'browse',
    state: { ...state, selected: [...state.selected, path] },
    message: `Added: ${path}`,
  };
}

export function applyChoice(state: BrowserState, choice: MenuChoice): Transition {
  switch (choice.kind) {
    case 'up':
      return { kind: 'browse', state: { ...state, currentPath: parentPath(state.currentPath) } };
    case 'add-current':
      return addPath(state, state.currentPath);
    case 'enter':
      return {
        kind: 'browse',
        state: { ...state, currentPath: joinSnapshotPath(state.currentPath, choice.name) },
      };
    case 'add-file':
      return addPath(state, joinSnapshotPath(state.currentPath, choice.name));
    case 'restore':
      if (state.selected.length === 0) {
        return { kind: 'browse', state, message: 'No items selected. Add paths first with [+].' };
      }
      return { kind: 'restore', paths: state.selected };
    case 'quit':
      return { kind: 'cancel' };
  }
}
