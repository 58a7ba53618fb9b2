import { SelectionError } from '../errors.js';
import { type Prompter, type SelectOption, type Selector } from '../types.js';

function printOptions<T>(options: readonly SelectOption<T>[]): void {
  options.forEach((option, i) => {
    console.error(`  [${i + 1}] ${option.label}`);
  });
  console.error('');
}

/** Maps a 1-based answer to an option index, or undefined when out of range. */
function parseIndex(token: string, count: number): number | undefined {
  if (!/^\d+$/.test(token)) {
    return undefined;
  }
  const n = Number(token);
  return n >= 1 && n <= count ? n - 1 : undefined;
}

/**
 * Fallback selector for hosts without fzf: prints a numbered list on stderr
 * and reads the choice through the prompter.
 */
export function createNumberedSelector(prompter: Prompter): Selector {
  return {
    kind: 'numbered',

    async selectOne<T>(options: readonly SelectOption<T>[], prompt: string): Promise<T | undefined> {
      if (options.length === 0) {
        return undefined;
      }
      printOptions(options);
      const answer = await prompter.text(`${prompt} [1-${options.length}]`);
      if (answer === undefined) {
        return undefined;
      }
      const index = parseIndex(answer.trim(), options.length);
      const option = index !== undefined ? options[index] : undefined;
      if (option === undefined) {
        throw new SelectionError(answer.trim());
      }
      return option.value;
    },

    async selectMany<T>(options: readonly SelectOption<T>[], prompt: string): Promise<T[]> {
      if (options.length === 0) {
        return [];
      }
      printOptions(options);
      console.error("Enter numbers separated by spaces, or 'all' for everything:");
      const answer = await prompter.text(prompt);
      if (answer === undefined) {
        return [];
      }
      if (answer.trim() === 'all') {
        return options.map((option) => option.value);
      }
      const chosen: T[] = [];
      for (const token of answer.trim().split(/\s+/)) {
        const index = parseIndex(token, options.length);
        const option = index !== undefined ? options[index] : undefined;
        if (option !== undefined) {
          chosen.push(option.value);
        }
      }
      return chosen;
    },
  };
}
