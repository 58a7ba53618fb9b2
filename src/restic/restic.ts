import { execFile } from 'node:child_process';

import { ResticError } from '../errors.js';
import {
  type DirectoryEntry,
  type PrerequisiteCheck,
  type ResticClient,
  type ResticConfig,
  type RestoreRequest,
  type Snapshot,
} from '../types.js';
import { isRecord } from '../utils.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LIST_TIMEOUT_MS = 2 * 60 * 1000;
/** `ls --json` of a large directory easily exceeds the 1 MB default */
const MAX_BUFFER = 64 * 1024 * 1024;
const SHORT_ID_LENGTH = 8;
const RESTIC_INSTALL_HINT =
  process.platform === 'darwin' ? 'brew install restic' : 'sudo apt install restic';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function buildRepository(config: ResticConfig): string {
  return `sftp:${config.user}@${config.targetHost}:${config.targetPath}`;
}

export function buildSftpCommand(config: ResticConfig): string {
  const port = config.sshPort !== 22 ? ` -p ${config.sshPort}` : '';
  return `ssh -i ${config.sshKeyPath}${port} ${config.user}@${config.targetHost} -s sftp`;
}

function buildEnv(config: ResticConfig): NodeJS.ProcessEnv {
  return {
    ...process.env,
    RESTIC_REPOSITORY: buildRepository(config),
    RESTIC_PASSWORD_COMMAND: config.passwordCommand,
  };
}

interface RunOptions {
  /** Options placed before the subcommand (`-o sftp.command=…`) */
  globalArgs?: readonly string[];
  /** 0 disables the timeout */
  timeout: number;
  env?: NodeJS.ProcessEnv;
}

function runRestic(subcommand: string, args: string[], options: RunOptions): Promise<string> {
  const { globalArgs = [], ...execOptions } = options;
  return new Promise<string>((resolve, reject) => {
    execFile(
      'restic',
      [...globalArgs, subcommand, ...args],
      { ...execOptions, encoding: 'utf8', maxBuffer: MAX_BUFFER },
      (err, stdout, stderr) => {
        if (err != null) {
          const exitCode = typeof err.code === 'number' ? err.code : undefined;
          reject(new ResticError(subcommand, exitCode, stderr.trim(), { cause: err }));
          return;
        }
        resolve(stdout);
      },
    );
  });
}

function parseSnapshot(raw: unknown, index: number): Snapshot {
  if (!isRecord(raw)) {
    throw new Error(`restic snapshot #${index} is not an object`);
  }
  const { id, short_id: shortId, time, hostname, paths } = raw;
  if (typeof id !== 'string' || typeof time !== 'string' || typeof hostname !== 'string') {
    throw new Error(`restic snapshot #${index} is missing id, time or hostname`);
  }
  return {
    id,
    shortId: typeof shortId === 'string' ? shortId : id.slice(0, SHORT_ID_LENGTH),
    time,
    hostname,
    paths: Array.isArray(paths)
      ? paths.filter((p: unknown): p is string => typeof p === 'string')
      : [],
  };
}

/** Parses `restic snapshots --json` output (a JSON array, oldest first). */
export function parseSnapshots(stdout: string): Snapshot[] {
  const trimmed = stdout.trim();
  if (trimmed.length === 0 || trimmed === 'null') {
    return [];
  }
  const raw: unknown = JSON.parse(trimmed);
  if (!Array.isArray(raw)) {
    throw new Error('restic snapshots --json did not return an array');
  }
  return raw.map(parseSnapshot);
}

function isNodeRecord(record: Record<string, unknown>): boolean {
  return record['struct_type'] === 'node' || record['message_type'] === 'node';
}

/**
 * Parses `restic ls --json` output: one JSON record per line, the first of
 * which describes the snapshot. Only node records with a name and type are
 * kept. The listed directory itself is dropped so only its children remain.
 */
export function parseLsOutput(stdout: string, dirPath: string): DirectoryEntry[] {
  const entries: DirectoryEntry[] = [];
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;
    const record: unknown = JSON.parse(trimmed);
    if (!isRecord(record) || !isNodeRecord(record)) continue;
    const { name, type, path } = record;
    if (typeof name !== 'string' || typeof type !== 'string') continue;
    const entryPath = typeof path === 'string' ? path : '';
    if (entryPath === dirPath) continue;
    entries.push({ name, type, path: entryPath });
  }
  return entries;
}

function parseVersionOutput(stdout: string): string | undefined {
  const match = /restic ([\d.]+)/.exec(stdout);
  return match?.[1];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Creates a client for the SFTP repository described by `config`. Every call
 * goes through `restic -o sftp.command=…` with the repository and password
 * command passed in the environment.
 */
export function createResticClient(config: ResticConfig): ResticClient {
  const globalArgs = ['-o', `sftp.command=${buildSftpCommand(config)}`];
  const env = buildEnv(config);

  return {
    async listSnapshots(options = {}): Promise<Snapshot[]> {
      const args = ['--json'];
      if (options.host !== undefined) {
        args.push('--host', options.host);
      }
      const stdout = await runRestic('snapshots', args, {
        globalArgs,
        timeout: LIST_TIMEOUT_MS,
        env,
      });
      return parseSnapshots(stdout);
    },

    async listDirectory(snapshotId: string, path: string): Promise<DirectoryEntry[]> {
      const stdout = await runRestic('ls', [snapshotId, path, '--json'], {
        globalArgs,
        timeout: LIST_TIMEOUT_MS,
        env,
      });
      return parseLsOutput(stdout, path);
    },

    async restore(snapshotId: string, request: RestoreRequest): Promise<string> {
      const args = [snapshotId, '--target', request.target];
      for (const p of request.include ?? []) {
        args.push('--include', p);
      }
      return runRestic('restore', args, { globalArgs, timeout: 0, env });
    },
  };
}

/**
 * Checks whether restic is installed and returns its version.
 * Used by the prerequisites checker.
 */
export async function checkResticInstalled(): Promise<PrerequisiteCheck> {
  try {
    const stdout = await runRestic('version', [], { timeout: LIST_TIMEOUT_MS });
    const version = parseVersionOutput(stdout);
    const result: PrerequisiteCheck = {
      name: 'restic',
      available: true,
      installHint: RESTIC_INSTALL_HINT,
    };
    if (version !== undefined) {
      result.version = version;
    }
    return result;
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    return {
      name: 'restic',
      available: false,
      error,
      installHint: RESTIC_INSTALL_HINT,
    };
  }
}
