/**
 * SSH Module Types
 */

import type { Readable, Writable } from 'node:stream';

/**
 * Where a stored connection string points to
 */
export interface ConnectionTarget {
  user: string;
  host: string;
  port: number;
}

/**
 * Credentials for a single authentication attempt
 */
export interface TransportCredentials {
  password?: string;
  privateKeyPath?: string;
  passphrase?: string;
}

/**
 * Pseudo-terminal dimensions, in character cells
 */
export interface PtySize {
  cols: number;
  rows: number;
}

/**
 * Duplex byte stream of a remote shell, read without blocking
 */
export interface ShellChannel {
  /**
   * Next pending chunk of remote output.
   * Returns `undefined` when nothing is pending, an empty buffer once the
   * remote side has sent EOF, and throws if the channel failed.
   */
  read(): Buffer | undefined;

  /**
   * Write bytes to the remote side in a single write
   */
  write(data: Buffer): void;

  /**
   * Change the remote pseudo-terminal size
   */
  resize(size: PtySize): void;

  close(): void;
}

/**
 * SFTP subsystem of a session
 */
export interface SftpSession {
  /**
   * Create (or truncate) a remote file for writing
   */
  createWriteStream(remotePath: string): Writable;

  /**
   * Open a remote file for reading. Resolves once the server has opened it.
   */
  openReadStream(remotePath: string): Promise<Readable>;

  /**
   * Size reported by the server, `undefined` when it reports none
   */
  size(remotePath: string): Promise<number | undefined>;

  close(): void;
}

/**
 * Authenticated, live connection.
 * Owned by one operation at a time, which must close it when done.
 */
export interface TransportSession {
  readonly target: ConnectionTarget;

  openShell(size: PtySize, term: string): Promise<ShellChannel>;

  openSftp(): Promise<SftpSession>;

  close(): void;
}

/**
 * Opens authenticated sessions.
 * Connect, handshake and authentication happen in one call; a failure is
 * reported as a TransportError telling which stage failed.
 */
export interface Transport {
  connect(target: ConnectionTarget, credentials: TransportCredentials): Promise<TransportSession>;
}

/**
 * Stage of a connection attempt
 */
export enum TransportStage {
  CONNECT = 'connect',
  HANDSHAKE = 'handshake',
  AUTHENTICATE = 'authenticate',
}

/**
 * Failure of a connection attempt
 */
export class TransportError extends Error {
  public readonly stage: TransportStage;
  /** The private key is encrypted and no (or a wrong) passphrase was given */
  public readonly passphraseRequired: boolean;

  constructor(stage: TransportStage, message: string, options: { cause?: unknown; passphraseRequired?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.stage = stage;
    this.passphraseRequired = options.passphraseRequired ?? false;
  }
}

/**
 * Interactive questions asked while authenticating
 */
export interface CredentialPrompter {
  /**
   * Ask for the passphrase of an encrypted private key
   */
  promptPassphrase(privateKeyPath: string): Promise<string>;

  /**
   * Ask for a login password; `undefined` or empty means the user declined
   */
  promptPassword(connectionString: string): Promise<string | undefined>;

  /**
   * Ask whether a password that just worked should be saved
   */
  confirmSavePassword(alias: string): Promise<boolean>;
}

/**
 * Session builder events
 */
export enum SessionEvent {
  CONNECTING = 'connecting',
  AUTHENTICATED = 'authenticated',
}

export type SessionListener = (event: SessionEvent, target: ConnectionTarget) => void;
