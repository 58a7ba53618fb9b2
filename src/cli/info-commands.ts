import { type Command } from 'commander';

import { loadResticConfig } from '../config.js';
import { checkConnectivity } from '../connectivity.js';
import { checkAllPrerequisites } from '../prerequisites.js';
import { buildRepository } from '../restic/restic.js';
import { formatSnapshotLine } from '../snapshots.js';
import { type PrerequisiteCheck, type ResticConfig } from '../types.js';

import { getBoolean, getString, log, openSession, wrapAction } from './shared.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatCheck(check: PrerequisiteCheck): string {
  if (check.available) {
    return `✓ ${check.version ?? 'installed'}`;
  }
  return check.name === 'fzf' ? '✗ not installed (numbered list fallback)' : '✗ not installed';
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

async function handleSnapshots(opts: Record<string, unknown>, command: Command): Promise<void> {
  const { config, client } = await openSession(command.optsWithGlobals());
  const all = getBoolean(opts, 'all');
  const snapshots = await client.listSnapshots(all ? {} : { host: config.hostName });
  if (snapshots.length === 0) {
    log('No snapshots found.');
    return;
  }
  for (const snapshot of snapshots) {
    log(formatSnapshotLine(snapshot));
  }
  const scope = all ? 'all hosts' : `host ${config.hostName}`;
  log(`\n${snapshots.length} snapshot(s) for ${scope}.`);
}

async function handleStatus(_opts: Record<string, unknown>, command: Command): Promise<void> {
  const configPath = getString(command.optsWithGlobals(), 'config');
  for (const check of await checkAllPrerequisites()) {
    log(`${`${check.name}:`.padEnd(15)}${formatCheck(check)}`);
  }

  let config: ResticConfig;
  try {
    config = await loadResticConfig(configPath);
  } catch (err) {
    log(`Config:        ${err instanceof Error ? err.message : String(err)}`);
    return;
  }
  log(`Repository:    ${buildRepository(config)}`);
  log(`Host name:     ${config.hostName}`);
  try {
    await checkConnectivity(config.targetHost, config.sshPort, config.connectTimeoutMs);
    log(`Target:        ✓ reachable on port ${config.sshPort}`);
  } catch {
    log(`Target:        ✗ not reachable on port ${config.sshPort}`);
  }
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerInfoCommands(program: Command): void {
  program
    .command('snapshots')
    .description("List this host's snapshots")
    .option('--all', 'list snapshots of every host')
    .action(wrapAction(handleSnapshots));

  program
    .command('status')
    .description('Show config, prerequisite and connectivity status')
    .action(wrapAction(handleStatus));
}
