/**
 * Channel adapters
 * Wrap ssh2 channels behind the ShellChannel and SftpSession interfaces
 */

import { once } from "node:events";
import type { Readable, Writable } from "node:stream";
import type { SFTPWrapper } from "ssh2";
import { logger } from "../utils/logger.js";
import type { PtySize, SftpSession, ShellChannel } from "./types.js";

const EOF = Buffer.alloc(0);

/**
 * The parts of an ssh2 `ClientChannel` the shell reads and writes through
 */
export interface ShellStream {
  on(event: "data", listener: (chunk: Buffer) => void): unknown;
  on(event: "end" | "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  stderr: {
    on(event: "data", listener: (chunk: Buffer) => void): unknown;
    removeAllListeners(event: "data"): unknown;
  };
  write(data: Buffer): unknown;
  setWindow(rows: number, cols: number, height: number, width: number): unknown;
  end(): unknown;
  removeAllListeners(event: "data"): unknown;
}

/**
 * Queues remote output as it arrives so the shell loop can read it without blocking
 */
export class BufferedShellChannel implements ShellChannel {
  private channel: ShellStream;
  private pending: Buffer[] = [];
  private ended = false;
  private failure: Error | undefined;

  constructor(channel: ShellStream) {
    this.channel = channel;

    // stdout and stderr share one queue, in arrival order
    channel.on("data", (chunk: Buffer) => this.pending.push(chunk));
    channel.stderr.on("data", (chunk: Buffer) => this.pending.push(chunk));
    channel.on("end", () => {
      this.ended = true;
    });
    channel.on("close", () => {
      this.ended = true;
    });
    channel.on("error", (error: Error) => {
      logger.debug("Shell channel error", { error: error.message });
      this.failure = error;
    });
  }

  public read(): Buffer | undefined {
    const chunk = this.pending.shift();
    if (chunk) {
      return chunk;
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.ended ? EOF : undefined;
  }

  public write(data: Buffer): void {
    this.channel.write(data);
  }

  public resize(size: PtySize): void {
    this.channel.setWindow(size.rows, size.cols, 0, 0);
  }

  public close(): void {
    if (!this.ended) {
      this.channel.end();
    }
    this.channel.removeAllListeners("data");
    this.channel.stderr.removeAllListeners("data");
  }
}

/**
 * SFTP subsystem of an ssh2 connection
 */
export class Ssh2SftpSession implements SftpSession {
  private sftp: SFTPWrapper;

  constructor(sftp: SFTPWrapper) {
    this.sftp = sftp;
  }

  public createWriteStream(remotePath: string): Writable {
    return this.sftp.createWriteStream(remotePath, { flags: "w" });
  }

  public async openReadStream(remotePath: string): Promise<Readable> {
    const stream = this.sftp.createReadStream(remotePath);
    await once(stream, "open");
    return stream;
  }

  public size(remotePath: string): Promise<number | undefined> {
    return new Promise((resolve, reject) => {
      this.sftp.stat(remotePath, (error, stats) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(typeof stats.size === "number" ? stats.size : undefined);
      });
    });
  }

  public close(): void {
    this.sftp.end();
  }
}
