// Public API for using the restore browser as a library
export * from './types.js';
export { ResticError, SelectionError, TargetUnreachableError, wrapError } from './errors.js';
export { loadResticConfig, parseResticConfig } from './config.js';
export { checkConnectivity } from './connectivity.js';
export { createResticClient, parseLsOutput, parseSnapshots } from './restic/restic.js';
export { createSelector, createFzfSelector, createNumberedSelector } from './selector/index.js';
export { createPrompter } from './prompt.js';
export { formatSnapshotLine, selectSnapshot } from './snapshots.js';
export { applyChoice, buildMenu } from './browser/menu.js';
export { browseSnapshot } from './browser/browser.js';
export { executeRestore, quickRestore } from './restore/restore.js';
export { runInteractiveRestore } from './restore/interactive.js';
export { createProgram, run } from './cli.js';
