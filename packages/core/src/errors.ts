/**
 * Error Module
 * Typed failures surfaced by the session, shell and transfer engines
 */

/**
 * Error codes
 */
export enum ErrorCode {
  ALIAS_NOT_FOUND = 'ALIAS_NOT_FOUND',
  INVALID_CONNECTION_STRING = 'INVALID_CONNECTION_STRING',
  CONNECT_FAILED = 'CONNECT_FAILED',
  HANDSHAKE_FAILED = 'HANDSHAKE_FAILED',
  AUTH_FAILED = 'AUTH_FAILED',
  NOT_A_FILE = 'NOT_A_FILE',
  INVALID_REMOTE_PATH = 'INVALID_REMOTE_PATH',
  DESTINATION_IS_FILE = 'DESTINATION_IS_FILE',
  CHANNEL_READ_ERROR = 'CHANNEL_READ_ERROR',
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  CONFIG_ERROR = 'CONFIG_ERROR',
  CREDENTIAL_STORE_ERROR = 'CREDENTIAL_STORE_ERROR',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
}

/**
 * What the error was about: alias, host, path...
 */
export type ErrorContext = Record<string, string | number>;

export interface RsshErrorOptions {
  cause?: unknown;
  context?: ErrorContext;
}

/**
 * Base error for every failure of the core
 */
export class RsshError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, options: RsshErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RsshError';
    this.code = code;
    this.context = options.context ?? {};
  }
}

/**
 * Type guard, optionally narrowed to one code
 */
export function isRsshError(error: unknown, code?: ErrorCode): error is RsshError {
  return error instanceof RsshError && (code === undefined || error.code === code);
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Errno code of a Node system error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
