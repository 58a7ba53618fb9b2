import { checkResticInstalled } from './restic/restic.js';
import { checkFzfInstalled } from './selector/fzf.js';
import { type PrerequisiteCheck } from './types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const TOOL_REASONS: Record<string, string> = {
  restic: 'Required to list snapshots and restore files.',
  fzf: 'Optional. Enables fuzzy selection; a numbered list is used without it.',
};

const TOOL_DOCS: Record<string, string> = {
  restic: 'https://restic.net',
  fzf: 'https://github.com/junegunn/fzf',
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatCheckError(check: PrerequisiteCheck): string {
  const reason = TOOL_REASONS[check.name] ?? 'Required for restore operations.';
  const docs = TOOL_DOCS[check.name];
  const lines: string[] = [`Missing dependency: ${check.name}`, `  Why: ${reason}`];
  if (check.installHint !== undefined) {
    lines.push(`  Install: ${check.installHint}`);
  }
  if (docs !== undefined) {
    lines.push(`  Docs: ${docs}`);
  }
  if (check.error !== undefined) {
    lines.push(`  Error: ${check.error}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Checks restic and fzf, in that order. */
export async function checkAllPrerequisites(): Promise<PrerequisiteCheck[]> {
  return Promise.all([checkResticInstalled(), checkFzfInstalled()]);
}

/**
 * Formats unavailable prerequisites with install instructions.
 * Returns an empty string if all prerequisites are met.
 */
export function formatPrerequisiteErrors(checks: readonly PrerequisiteCheck[]): string {
  const failed = checks.filter((c) => !c.available);
  if (failed.length === 0) {
    return '';
  }
  return failed.map(formatCheckError).join('\n\n');
}

/** Throws with install instructions when restic is not installed. */
export async function assertResticInstalled(): Promise<void> {
  const check = await checkResticInstalled();
  if (!check.available) {
    throw new Error(formatPrerequisiteErrors([check]));
  }
}
