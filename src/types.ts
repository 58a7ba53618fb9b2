/**
 * Core types shared by the restore browser modules.
 */

// =============================================================================
// Config
// =============================================================================

export interface ResticConfig {
  /** SFTP user on the backup target */
  user: string;
  /** Backup target host (IP or hostname) */
  targetHost: string;
  /** Repository path on the backup target */
  targetPath: string;
  /** Name this machine uses for its snapshots (`restic backup --host`) */
  hostName: string;
  /** SSH port of the backup target, also used by the connectivity check */
  sshPort: number;
  /** Private key handed to ssh for the SFTP connection */
  sshKeyPath: string;
  /** Command restic runs to obtain the repository password */
  passwordCommand: string;
  /** Timeout for the connectivity check */
  connectTimeoutMs: number;
}

// =============================================================================
// Restic records
// =============================================================================

export interface Snapshot {
  /** Full snapshot id */
  id: string;
  /** Short id as printed by restic */
  shortId: string;
  /** ISO 8601 creation time */
  time: string;
  /** Host that created the snapshot */
  hostname: string;
  /** Backed-up root paths */
  paths: string[];
}

/** restic node type; `dir` and `file` are the common ones */
export type EntryType = 'dir' | 'file' | 'symlink' | (string & {});

export interface DirectoryEntry {
  name: string;
  type: EntryType;
  /** Absolute path inside the snapshot */
  path: string;
}

export interface RestoreRequest {
  /** Directory restic writes into; `/` restores to the original locations */
  target: string;
  /** `--include` filters; omit for a whole-snapshot restore */
  include?: readonly string[];
}

export interface ResticClient {
  listSnapshots(options?: { host?: string }): Promise<Snapshot[]>;
  listDirectory(snapshotId: string, path: string): Promise<DirectoryEntry[]>;
  restore(snapshotId: string, request: RestoreRequest): Promise<string>;
}

// =============================================================================
// Selection
// =============================================================================

export interface SelectOption<T> {
  /** Display line shown to the user */
  label: string;
  value: T;
}

export interface Selector {
  /** Which implementation is in use, for status output */
  readonly kind: 'fzf' | 'numbered';

  /** Resolves to undefined when nothing was selected. */
  selectOne<T>(options: readonly SelectOption<T>[], prompt: string): Promise<T | undefined>;

  /** Resolves to an empty array when nothing was selected. */
  selectMany<T>(options: readonly SelectOption<T>[], prompt: string): Promise<T[]>;
}

export interface Prompter {
  /** Free-text answer, or undefined when the prompt was aborted */
  text(message: string): Promise<string | undefined>;
  /** Yes/no answer, or undefined when the prompt was aborted */
  confirm(message: string, initial: boolean): Promise<boolean | undefined>;
}

// =============================================================================
// Browser
// =============================================================================

export type MenuChoice =
  | { kind: 'up' }
  | { kind: 'add-current' }
  | { kind: 'restore' }
  | { kind: 'quit' }
  | { kind: 'enter'; name: string }
  | { kind: 'add-file'; name: string };

export interface BrowserState {
  currentPath: string;
  /** Insertion-ordered; duplicates are harmless for `--include` */
  selected: readonly string[];
}

export type Transition =
  | { kind: 'browse'; state: BrowserState; message?: string }
  | { kind: 'restore'; paths: readonly string[] }
  | { kind: 'cancel' };

export type BrowseOutcome =
  | { kind: 'restore'; paths: readonly string[] }
  | { kind: 'cancelled' };

// =============================================================================
// Restore Result
// =============================================================================

export interface RestoreResult {
  /** False when the user declined a confirmation */
  restored: boolean;
  snapshotId: string;
  /** Target passed to restic (`/` for original locations) */
  target?: string;
  /** Paths passed as include filters (empty for a whole-snapshot restore) */
  paths: readonly string[];
}

// =============================================================================
// Prerequisites
// =============================================================================

export interface PrerequisiteCheck {
  name: string;
  available: boolean;
  version?: string;
  error?: string;
  installHint?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0';
export const DEFAULT_ENV_FILE = '~/.config/restic/env.sh';
export const DEFAULT_SSH_KEY = '~/.ssh/restic';
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const KEYCHAIN_SERVICE = 'restic-backup';
export const ROOT_PATH = '/';
/** Display width of the path column in snapshot lines */
export const SNAPSHOT_PATHS_WIDTH = 50;
