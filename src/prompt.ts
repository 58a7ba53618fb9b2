import { type Readable, type Writable } from 'node:stream';

import prompts from 'prompts';

import { type Prompter } from './types.js';

export interface PrompterStreams {
  stdin: Readable;
  /** Prompts render here; stderr by default so stdout stays clean */
  stdout: Writable;
}

/**
 * Creates a Prompter backed by `prompts`. An aborted prompt (Ctrl-C, Esc)
 * leaves the answer unset, which surfaces as `undefined`.
 */
export function createPrompter(
  streams: PrompterStreams = { stdin: process.stdin, stdout: process.stderr },
): Prompter {
  return {
    async text(message: string): Promise<string | undefined> {
      const answers = await prompts({ type: 'text', name: 'value', message, ...streams });
      const value: unknown = answers['value'];
      return typeof value === 'string' ? value : undefined;
    },

    async confirm(message: string, initial: boolean): Promise<boolean | undefined> {
      const answers = await prompts({ type: 'confirm', name: 'value', message, initial, ...streams });
      const value: unknown = answers['value'];
      return typeof value === 'boolean' ? value : undefined;
    },
  };
}
