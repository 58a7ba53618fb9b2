import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ResticError } from '../errors.js';
import { type ResticConfig } from '../types.js';

import {
  buildRepository,
  buildSftpCommand,
  checkResticInstalled,
  createResticClient,
  parseLsOutput,
  parseSnapshots,
} from './restic.js';

// ---------------------------------------------------------------------------
// Mock setup
// ---------------------------------------------------------------------------

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
}));

vi.mock('node:child_process', () => ({
  execFile: mockExecFile,
}));

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

type ExecCallback = (err: Error | null, stdout: string, stderr: string) => void;

function succeedWith(stdout: string): void {
  mockExecFile.mockImplementation(
    (_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
      cb(null, stdout, '');
    },
  );
}

function failWith(code: number, stderr: string): void {
  mockExecFile.mockImplementation(
    (_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
      cb(Object.assign(new Error('Command failed'), { code }), '', stderr);
    },
  );
}

const CONFIG: ResticConfig = {
  user: 'restic',
  targetHost: 'nas.local',
  targetPath: '/backups',
  hostName: 'laptop',
  sshPort: 22,
  sshKeyPath: '/home/testuser/.ssh/restic',
  passwordCommand: 'pass show restic',
  connectTimeoutMs: 5000,
};

const GLOBAL_ARGS = ['-o', 'sftp.command=ssh -i /home/testuser/.ssh/restic restic@nas.local -s sftp'];

const SNAPSHOTS_JSON = JSON.stringify([
  {
    time: '2024-03-01T10:00:00.123456+01:00',
    hostname: 'laptop',
    paths: ['/Users/me/Documents', '/Users/me/.config'],
    id: 'abc123ff00112233',
    short_id: 'abc123ff',
  },
  {
    time: '2024-03-02T10:00:00+01:00',
    hostname: 'desktop',
    paths: ['/home/me'],
    id: 'def456aa99887766',
  },
]);

const LS_OUTPUT = [
  '{"time":"2024-03-01T10:00:00Z","tree":"t1","paths":["/home"],"hostname":"laptop","id":"abc","short_id":"abc","struct_type":"snapshot"}',
  '{"name":"home","type":"dir","path":"/home","struct_type":"node"}',
  '{"name":"notes.txt","type":"file","path":"/home/notes.txt","size":12,"struct_type":"node"}',
  '{"name":"projects","type":"dir","path":"/home/projects","message_type":"node"}',
  '',
].join('\n');

function lastCall(): [string, string[], Record<string, unknown>] {
  const call = mockExecFile.mock.calls.at(-1);
  if (call === undefined) {
    throw new Error('execFile was not called');
  }
  return [call[0], call[1], call[2]];
}

// ---------------------------------------------------------------------------
// Command construction
// ---------------------------------------------------------------------------

describe('buildRepository / buildSftpCommand', () => {
  it('should build the sftp repository string', () => {
    expect(buildRepository(CONFIG)).toBe('sftp:restic@nas.local:/backups');
  });

  it('should only pass a port to ssh when it is not the default', () => {
    expect(buildSftpCommand(CONFIG)).toBe('ssh -i /home/testuser/.ssh/restic restic@nas.local -s sftp');
    expect(buildSftpCommand({ ...CONFIG, sshPort: 2222 })).toBe(
      'ssh -i /home/testuser/.ssh/restic -p 2222 restic@nas.local -s sftp',
    );
  });
});

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

describe('parseSnapshots', () => {
  it('should map restic records and derive a missing short id', () => {
    expect(parseSnapshots(SNAPSHOTS_JSON)).toEqual([
      {
        id: 'abc123ff00112233',
        shortId: 'abc123ff',
        time: '2024-03-01T10:00:00.123456+01:00',
        hostname: 'laptop',
        paths: ['/Users/me/Documents', '/Users/me/.config'],
      },
      {
        id: 'def456aa99887766',
        shortId: 'def456aa',
        time: '2024-03-02T10:00:00+01:00',
        hostname: 'desktop',
        paths: ['/home/me'],
      },
    ]);
  });

  it('should return an empty list for empty or null output', () => {
    expect(parseSnapshots('')).toEqual([]);
    expect(parseSnapshots('null\n')).toEqual([]);
  });

  it('should reject output that is not an array', () => {
    expect(() => parseSnapshots('{}')).toThrow('restic snapshots --json did not return an array');
  });

  it('should reject records without an id', () => {
    expect(() => parseSnapshots('[{"time":"t","hostname":"h"}]')).toThrow(
      'restic snapshot #0 is missing id, time or hostname',
    );
  });
});

describe('parseLsOutput', () => {
  it('should keep node records and drop the snapshot record and the listed directory', () => {
    expect(parseLsOutput(LS_OUTPUT, '/home')).toEqual([
      { name: 'notes.txt', type: 'file', path: '/home/notes.txt' },
      { name: 'projects', type: 'dir', path: '/home/projects' },
    ]);
  });

  it('should keep every child when listing the root', () => {
    expect(parseLsOutput(LS_OUTPUT, '/').map((e) => e.name)).toEqual([
      'home',
      'notes.txt',
      'projects',
    ]);
  });

  it('should return nothing when only the snapshot record is printed', () => {
    expect(parseLsOutput(`${LS_OUTPUT.split('\n')[0] ?? ''}\n`, '/missing')).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// createResticClient
// ---------------------------------------------------------------------------

describe('createResticClient', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe('listSnapshots', () => {
    it('should call restic snapshots --json with the repository in the environment', async () => {
      succeedWith(SNAPSHOTS_JSON);
      const snapshots = await createResticClient(CONFIG).listSnapshots();

      const [file, args, opts] = lastCall();
      expect(file).toBe('restic');
      expect(args).toEqual([...GLOBAL_ARGS, 'snapshots', '--json']);
      expect(opts).toEqual(
        expect.objectContaining({
          timeout: 120000,
          encoding: 'utf8',
          env: expect.objectContaining({
            RESTIC_REPOSITORY: 'sftp:restic@nas.local:/backups',
            RESTIC_PASSWORD_COMMAND: 'pass show restic',
          }),
        }),
      );
      expect(snapshots.map((s) => s.shortId)).toEqual(['abc123ff', 'def456aa']);
    });

    it('should filter by host when asked', async () => {
      succeedWith('[]');
      await createResticClient(CONFIG).listSnapshots({ host: 'laptop' });

      expect(lastCall()[1]).toEqual([...GLOBAL_ARGS, 'snapshots', '--json', '--host', 'laptop']);
    });
  });

  describe('listDirectory', () => {
    it('should call restic ls with the snapshot and path', async () => {
      succeedWith(LS_OUTPUT);
      const entries = await createResticClient(CONFIG).listDirectory('abc123ff', '/home');

      expect(lastCall()[1]).toEqual([...GLOBAL_ARGS, 'ls', 'abc123ff', '/home', '--json']);
      expect(entries).toHaveLength(2);
    });
  });

  describe('restore', () => {
    it('should pass one --include per path and no timeout', async () => {
      succeedWith('restoring <Snapshot abc123ff> to /\n');
      const output = await createResticClient(CONFIG).restore('abc123ff', {
        target: '/',
        include: ['/home/notes.txt', '/etc/hosts'],
      });

      const [, args, opts] = lastCall();
      expect(args).toEqual([
        ...GLOBAL_ARGS,
        'restore',
        'abc123ff',
        '--target',
        '/',
        '--include',
        '/home/notes.txt',
        '--include',
        '/etc/hosts',
      ]);
      expect(opts['timeout']).toBe(0);
      expect(output).toBe('restoring <Snapshot abc123ff> to /\n');
    });

    it('should restore the whole snapshot when no includes are given', async () => {
      succeedWith('');
      await createResticClient(CONFIG).restore('abc123ff', { target: '/tmp/out' });

      expect(lastCall()[1]).toEqual([...GLOBAL_ARGS, 'restore', 'abc123ff', '--target', '/tmp/out']);
    });

    it('should reject with a ResticError carrying stderr and exit code', async () => {
      failWith(1, 'Fatal: unable to open repository\n');
      const promise = createResticClient(CONFIG).restore('abc123ff', { target: '/' });

      await expect(promise).rejects.toBeInstanceOf(ResticError);
      await expect(promise).rejects.toMatchObject({
        message: 'restic restore failed: Fatal: unable to open repository',
        exitCode: 1,
        subcommand: 'restore',
      });
    });
  });
});

// ---------------------------------------------------------------------------
// checkResticInstalled
// ---------------------------------------------------------------------------

describe('checkResticInstalled', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should report the installed version', async () => {
    succeedWith('restic 0.16.4 compiled with go1.22.1 on darwin/arm64\n');
    const check = await checkResticInstalled();

    expect(lastCall()[1]).toEqual(['version']);
    expect(check).toMatchObject({ name: 'restic', available: true, version: '0.16.4' });
  });

  it('should report restic as unavailable when the command fails', async () => {
    failWith(127, 'restic: command not found');
    const check = await checkResticInstalled();

    expect(check.available).toBe(false);
    expect(check.error).toBe('restic version failed: restic: command not found');
  });
});
