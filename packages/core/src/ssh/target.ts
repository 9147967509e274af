/**
 * Connection string parsing
 */

import { ErrorCode, RsshError } from '../errors.js';
import type { ConnectionTarget } from './types.js';

export const DEFAULT_SSH_PORT = 22;

/**
 * Validate a TCP port number
 */
export function validatePort(port: number): { valid: boolean; error?: string } {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return { valid: false, error: 'Port must be a number between 1 and 65535' };
  }

  return { valid: true };
}

/**
 * Parse a port given as text (command line option, prompt answer)
 */
export function parsePort(value: string): number {
  const port = /^\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
  const validation = validatePort(port);
  if (!validation.valid) {
    throw new RsshError(ErrorCode.INVALID_ARGUMENT, `Invalid port '${value}': ${validation.error}`, {
      context: { port: value },
    });
  }
  return port;
}

/**
 * Split `user@host` into a connection target.
 * Exactly one `@` with something on both sides.
 */
export function parseConnectionString(connectionString: string, port: number = DEFAULT_SSH_PORT): ConnectionTarget {
  const parts = connectionString.split('@');
  if (parts.length !== 2 || parts[0].length === 0 || parts[1].length === 0) {
    throw new RsshError(
      ErrorCode.INVALID_CONNECTION_STRING,
      `Invalid connection string '${connectionString}'. Use 'user@host'.`,
      { context: { connectionString } }
    );
  }

  const validation = validatePort(port);
  if (!validation.valid) {
    throw new RsshError(ErrorCode.INVALID_ARGUMENT, validation.error ?? 'Invalid port', { context: { port } });
  }

  return { user: parts[0], host: parts[1], port };
}

export function formatTarget(target: ConnectionTarget): string {
  return `${target.user}@${target.host}:${target.port}`;
}
