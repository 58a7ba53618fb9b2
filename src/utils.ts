import { homedir } from 'node:os';
import { posix, resolve } from 'node:path';

import { ROOT_PATH } from './types.js';

/**
 * Returns true if `value` is a non-null, non-array object.
 * Shared type guard used across all modules.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Replaces a leading `~` with the user's home directory. */
export function expandHome(p: string): string {
  if (p === '~') {
    return homedir();
  }
  if (p.startsWith('~/')) {
    return posix.join(homedir(), p.slice(2));
  }
  return p;
}

/** `~`-expands and resolves `p` against the working directory. */
export function resolveTarget(p: string): string {
  return resolve(expandHome(p));
}

/** Parent of a snapshot path; the parent of `/` is `/`. */
export function parentPath(current: string): string {
  return posix.dirname(current);
}

/** Appends an entry name to a snapshot path without doubling the separator. */
export function joinSnapshotPath(current: string, name: string): string {
  if (current === ROOT_PATH) {
    return `${ROOT_PATH}${name}`;
  }
  return `${current}/${name}`;
}

/** Returns the error code of a Node system error (`ENOENT`, …), if any. */
export function getErrorCode(err: unknown): string | undefined {
  if (isRecord(err) && typeof err['code'] === 'string') {
    return err['code'];
  }
  return undefined;
}
