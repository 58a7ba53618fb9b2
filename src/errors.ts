/**
 * Wraps an unknown error value in a new Error with additional context.
 * Preserves the original error as `cause`.
 */
export function wrapError(context: string, err: unknown): Error {
  if (err instanceof Error) {
    return new Error(`${context}: ${err.message}`, { cause: err });
  }
  return new Error(`${context}: ${String(err)}`);
}

/** A restic invocation exited non-zero or could not be started. */
export class ResticError extends Error {
  override readonly name = 'ResticError';

  constructor(
    readonly subcommand: string,
    readonly exitCode: number | undefined,
    readonly stderr: string,
    options?: ErrorOptions,
  ) {
    const detail = stderr.length > 0 ? `: ${stderr}` : '';
    super(`restic ${subcommand} failed${detail}`, options);
  }
}

/** The backup target did not accept a TCP connection in time. */
export class TargetUnreachableError extends Error {
  override readonly name = 'TargetUnreachableError';

  constructor(
    readonly host: string,
    readonly port: number,
    options?: ErrorOptions,
  ) {
    super(`Backup target ${host} not reachable on port ${port}`, options);
  }
}

/** The user typed something the numbered selector cannot map to an option. */
export class SelectionError extends Error {
  override readonly name = 'SelectionError';

  constructor(readonly input: string) {
    super(`Invalid selection: "${input}"`);
  }
}
