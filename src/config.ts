import { readFile } from 'node:fs/promises';
import { hostname, userInfo } from 'node:os';

import { parse } from 'dotenv';

import { wrapError } from './errors.js';
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_ENV_FILE,
  DEFAULT_SSH_KEY,
  DEFAULT_SSH_PORT,
  KEYCHAIN_SERVICE,
  type ResticConfig,
} from './types.js';
import { expandHome, getErrorCode } from './utils.js';

const DEFAULT_USER = 'restic';
const DEFAULT_TARGET_PATH = '/mnt/zpool1/computer_backups';

function optionalString(raw: Record<string, string>, key: string): string | undefined {
  const value = raw[key]?.trim();
  return value !== undefined && value.length > 0 ? value : undefined;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_SSH_PORT;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`RESTIC_SSH_PORT must be an integer between 1 and 65535, got: ${raw}`);
  }
  return port;
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_CONNECT_TIMEOUT_MS;
  }
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`RESTIC_CONNECT_TIMEOUT must be a positive number of seconds, got: ${raw}`);
  }
  return Math.round(seconds * 1000);
}

/** Short hostname, the same value `hostname -s` prints. */
function shortHostname(): string {
  return hostname().split('.')[0] ?? hostname();
}

function currentUser(): string {
  return process.env['USER'] ?? userInfo().username;
}

/**
 * Builds a config from the key/value pairs of an env file. Only
 * RESTIC_TARGET_HOST is required; everything else has the defaults the
 * setup script writes.
 */
export function parseResticConfig(raw: Record<string, string>): ResticConfig {
  const targetHost = optionalString(raw, 'RESTIC_TARGET_HOST');
  if (targetHost === undefined) {
    throw new Error('RESTIC_TARGET_HOST is required');
  }
  return {
    user: optionalString(raw, 'RESTIC_USER') ?? DEFAULT_USER,
    targetHost,
    targetPath: optionalString(raw, 'RESTIC_TARGET_PATH') ?? DEFAULT_TARGET_PATH,
    hostName: optionalString(raw, 'RESTIC_HOST_NAME') ?? shortHostname(),
    sshPort: parsePort(optionalString(raw, 'RESTIC_SSH_PORT')),
    sshKeyPath: expandHome(optionalString(raw, 'RESTIC_SSH_KEY') ?? DEFAULT_SSH_KEY),
    passwordCommand:
      optionalString(raw, 'RESTIC_PASSWORD_COMMAND') ??
      `security find-generic-password -s ${KEYCHAIN_SERVICE} -a ${currentUser()} -w`,
    connectTimeoutMs: parseTimeout(optionalString(raw, 'RESTIC_CONNECT_TIMEOUT')),
  };
}

async function readEnvFile(resolved: string): Promise<string> {
  try {
    return await readFile(resolved, 'utf8');
  } catch (err) {
    if (getErrorCode(err) === 'ENOENT') {
      throw new Error(`${resolved} not found. Run the restic setup script first.`, {
        cause: err,
      });
    }
    throw wrapError(`Failed to read restic config from ${resolved}`, err);
  }
}

/**
 * Loads the env file written by the setup script. The file is parsed, never
 * sourced, so shell expansions in it are taken literally.
 */
export async function loadResticConfig(configPath?: string): Promise<ResticConfig> {
  const resolved = expandHome(configPath ?? DEFAULT_ENV_FILE);
  const content = await readEnvFile(resolved);
  try {
    return parseResticConfig(parse(content));
  } catch (err) {
    throw wrapError(`Invalid restic config in ${resolved}`, err);
  }
}
