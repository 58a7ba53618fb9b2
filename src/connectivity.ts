import { createConnection } from 'node:net';

import { TargetUnreachableError } from './errors.js';
import { DEFAULT_CONNECT_TIMEOUT_MS } from './types.js';

/**
 * Opens a TCP connection to `host:port` and closes it again. Rejects with
 * TargetUnreachableError on refusal, lookup failure or timeout.
 */
export function checkConnectivity(
  host: string,
  port: number,
  timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const socket = createConnection({ host, port });
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.destroy();
      resolve();
    });
    socket.once('timeout', () => {
      socket.destroy();
      const cause = new Error(`timed out after ${timeoutMs}ms`);
      reject(new TargetUnreachableError(host, port, { cause }));
    });
    socket.once('error', (err) => {
      socket.destroy();
      reject(new TargetUnreachableError(host, port, { cause: err }));
    });
  });
}
