import { type Prompter, type Selector } from '../types.js';

import { checkFzfInstalled, createFzfSelector } from './fzf.js';
import { createNumberedSelector } from './numbered.js';

export { checkFzfInstalled, createFzfSelector } from './fzf.js';
export { createNumberedSelector } from './numbered.js';

export interface SelectorOptions {
  prompter: Prompter;
  /** Skip the fzf probe and use the numbered list */
  disableFzf?: boolean;
}

/**
 * Picks the selector once per run: fzf when it is installed, the numbered
 * list otherwise.
 */
export async function createSelector(options: SelectorOptions): Promise<Selector> {
  if (options.disableFzf !== true) {
    const fzf = await checkFzfInstalled();
    if (fzf.available) {
      return createFzfSelector();
    }
  }
  return createNumberedSelector(options.prompter);
}
