// ---------------------------------------------------------------------------
// Shared CLI helpers — output, option extraction, error handling, setup
// ---------------------------------------------------------------------------

import { loadResticConfig } from '../config.js';
import { checkConnectivity } from '../connectivity.js';
import { assertResticInstalled } from '../prerequisites.js';
import { createResticClient } from '../restic/restic.js';
import { type ResticClient, type ResticConfig } from '../types.js';

/** Command results; the only thing written to stdout. */
export function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

/** Progress and diagnostics, kept on stderr. */
export function status(msg: string): void {
  console.error(msg);
}

export function getString(opts: Record<string, unknown>, key: string): string | undefined {
  const v = opts[key];
  return typeof v === 'string' ? v : undefined;
}

export function getBoolean(opts: Record<string, unknown>, key: string): boolean {
  return opts[key] === true;
}

export function printError(err: unknown): void {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${msg}`);
}

/**
 * Reports a failed action and sets the exit code instead of calling
 * process.exit(), so pending output is flushed before the process ends.
 */
export function wrapAction<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      printError(err);
      process.exitCode = 1;
    }
  };
}

export interface Session {
  config: ResticConfig;
  client: ResticClient;
}

/**
 * Everything a restic-backed command needs before its first restic call:
 * the config file, a reachable backup target and the restic binary, checked
 * in that order so an unreachable target stops the run before restic starts.
 */
export async function openSession(opts: Record<string, unknown>): Promise<Session> {
  const config = await loadResticConfig(getString(opts, 'config'));
  await checkConnectivity(config.targetHost, config.sshPort, config.connectTimeoutMs);
  await assertResticInstalled();
  return { config, client: createResticClient(config) };
}
