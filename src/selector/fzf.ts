import { execFile, spawn } from 'node:child_process';

import { wrapError } from '../errors.js';
import { type PrerequisiteCheck, type SelectOption, type Selector } from '../types.js';
import { getErrorCode } from '../utils.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const VERSION_TIMEOUT_MS = 10 * 1000;
/** fzf exits 1 when nothing matched and 130 when interrupted */
const CANCEL_EXIT_CODES: ReadonlySet<unknown> = new Set([1, 130]);
const MULTI_HEADER = 'TAB to select multiple, ENTER to confirm';
const FZF_INSTALL_HINT =
  process.platform === 'darwin' ? 'brew install fzf' : 'sudo apt install fzf';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Each option becomes `<index>\t<label>`; fzf only shows the label and prints
 * the whole line back, so the index maps the choice to its option no matter
 * what the label contains.
 */
function toInput<T>(options: readonly SelectOption<T>[]): string {
  return options.map((option, i) => `${i}\t${option.label.replace(/\n/g, ' ')}`).join('\n');
}

function fromOutput<T>(stdout: string, options: readonly SelectOption<T>[]): T[] {
  const chosen: T[] = [];
  for (const line of stdout.split('\n')) {
    if (line.length === 0) continue;
    const option = options[Number(line.split('\t', 1)[0])];
    if (option !== undefined) {
      chosen.push(option.value);
    }
  }
  return chosen;
}

function baseArgs(prompt: string): string[] {
  return ['--height=40%', '--reverse', `--prompt=${prompt} `, '--delimiter=\t', '--with-nth=2..'];
}

/**
 * Runs fzf with `input` on stdin and collects the selection from stdout.
 * stderr stays attached to the terminal, where fzf draws its interface.
 * Resolves to '' when the user cancelled.
 */
function runFzf(args: string[], input: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const child = spawn('fzf', args, { stdio: ['pipe', 'pipe', 'inherit'] });
    let stdout = '';
    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: unknown) => {
      stdout += String(chunk);
    });
    child.on('error', (err: Error) => {
      reject(new Error(`fzf failed: ${err.message}`, { cause: err }));
    });
    child.on('close', (code: number | null) => {
      if (code === 0) {
        resolve(stdout);
        return;
      }
      if (CANCEL_EXIT_CODES.has(code)) {
        resolve('');
        return;
      }
      reject(new Error(`fzf exited with code ${code ?? 'null'}`));
    });
    // fzf stops reading once a choice is made, so the rest of a long list may hit EPIPE
    child.stdin?.on('error', (err: Error) => {
      if (getErrorCode(err) !== 'EPIPE') {
        reject(wrapError('Failed to write fzf input', err));
      }
    });
    child.stdin?.end(`${input}\n`);
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function createFzfSelector(): Selector {
  return {
    kind: 'fzf',

    async selectOne<T>(options: readonly SelectOption<T>[], prompt: string): Promise<T | undefined> {
      if (options.length === 0) {
        return undefined;
      }
      const stdout = await runFzf(baseArgs(prompt), toInput(options));
      return fromOutput(stdout, options)[0];
    },

    async selectMany<T>(options: readonly SelectOption<T>[], prompt: string): Promise<T[]> {
      if (options.length === 0) {
        return [];
      }
      const args = [...baseArgs(prompt), '--multi', `--header=${MULTI_HEADER}`];
      const stdout = await runFzf(args, toInput(options));
      return fromOutput(stdout, options);
    },
  };
}

/** Checks whether fzf is on the PATH. */
export async function checkFzfInstalled(): Promise<PrerequisiteCheck> {
  return new Promise<PrerequisiteCheck>((resolve) => {
    execFile(
      'fzf',
      ['--version'],
      { encoding: 'utf8', timeout: VERSION_TIMEOUT_MS },
      (err, stdout) => {
        if (err != null) {
          resolve({
            name: 'fzf',
            available: false,
            error: err.message,
            installHint: FZF_INSTALL_HINT,
          });
          return;
        }
        const result: PrerequisiteCheck = {
          name: 'fzf',
          available: true,
          installHint: FZF_INSTALL_HINT,
        };
        const version = /^([\d.]+)/.exec(stdout.trim())?.[1];
        if (version !== undefined) {
          result.version = version;
        }
        resolve(result);
      },
    );
  });
}
