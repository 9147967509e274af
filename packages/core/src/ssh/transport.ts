/**
 * SSH Transport
 * Opens authenticated sessions with node-ssh
 */

import { NodeSSH } from "node-ssh";
import fs from "node:fs/promises";
import { logger } from "../utils/logger.js";
import { errorMessage } from "../errors.js";
import { BufferedShellChannel, Ssh2SftpSession } from "./channel.js";
import { formatTarget } from "./target.js";
import type {
  ConnectionTarget,
  PtySize,
  SftpSession,
  ShellChannel,
  Transport,
  TransportCredentials,
  TransportSession,
} from "./types.js";
import { TransportError, TransportStage } from "./types.js";

/**
 * Transport options
 */
export interface NodeSshTransportOptions {
  /** Milliseconds to wait for the handshake */
  readyTimeout?: number;
}

/**
 * `level` set by ssh2 on the errors it emits
 */
function errorLevel(error: unknown): string | undefined {
  if (error instanceof Error && "level" in error && typeof error.level === "string") {
    return error.level;
  }
  return undefined;
}

/**
 * Work out which stage a connection attempt failed in
 */
export function classifyTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  const message = errorMessage(error);
  const level = errorLevel(error);

  // ssh2 refuses an encrypted key while parsing it, before any socket is opened
  if (/passphrase/i.test(message)) {
    return new TransportError(TransportStage.AUTHENTICATE, message, { cause: error, passphraseRequired: true });
  }
  if (level === "client-authentication" || /private ?key/i.test(message)) {
    return new TransportError(TransportStage.AUTHENTICATE, message, { cause: error });
  }
  if (level === "client-timeout" || level === "protocol" || level === "handshake") {
    return new TransportError(TransportStage.HANDSHAKE, message, { cause: error });
  }
  // client-socket, DNS and errno failures
  return new TransportError(TransportStage.CONNECT, message, { cause: error });
}

/**
 * Authenticated node-ssh connection
 */
export class NodeSshSession implements TransportSession {
  public readonly target: ConnectionTarget;
  private ssh: NodeSSH;
  private closed = false;

  constructor(ssh: NodeSSH, target: ConnectionTarget) {
    this.ssh = ssh;
    this.target = target;
  }

  public async openShell(size: PtySize, term: string): Promise<ShellChannel> {
    logger.debug("Requesting shell", { term, cols: size.cols, rows: size.rows });
    const channel = await this.ssh.requestShell({ term, cols: size.cols, rows: size.rows });
    return new BufferedShellChannel(channel);
  }

  public async openSftp(): Promise<SftpSession> {
    const sftp = await this.ssh.requestSFTP();
    return new Ssh2SftpSession(sftp);
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.ssh.dispose();
    logger.info("SSH connection closed", { target: formatTarget(this.target) });
  }
}

/**
 * Transport implementation on node-ssh
 */
export class NodeSshTransport implements Transport {
  private options: NodeSshTransportOptions;

  constructor(options: NodeSshTransportOptions = {}) {
    this.options = options;
  }

  public async connect(target: ConnectionTarget, credentials: TransportCredentials): Promise<TransportSession> {
    let privateKey: string | undefined;
    if (credentials.privateKeyPath) {
      try {
        privateKey = await fs.readFile(credentials.privateKeyPath, "utf-8");
      } catch (error) {
        throw new TransportError(
          TransportStage.AUTHENTICATE,
          `Failed to read private key ${credentials.privateKeyPath}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    }

    logger.info("Connecting to SSH server", {
      host: target.host,
      port: target.port,
      username: target.user,
      method: privateKey ? "publickey" : "password",
      withPassphrase: credentials.passphrase !== undefined,
    });

    const ssh = new NodeSSH();
    try {
      await ssh.connect({
        host: target.host,
        port: target.port,
        username: target.user,
        password: credentials.password,
        privateKey,
        passphrase: credentials.passphrase,
        readyTimeout: this.options.readyTimeout,
      });
    } catch (error) {
      // Whatever got opened goes away with the failed attempt
      ssh.dispose();
      const failure = classifyTransportError(error);
      logger.info("SSH connection attempt failed", { stage: failure.stage, error: failure.message });
      throw failure;
    }

    logger.info("SSH connection established", { target: formatTarget(target) });
    return new NodeSshSession(ssh, target);
  }
}
