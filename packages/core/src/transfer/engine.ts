/**
 * File Transfer Engine
 * Streams single files between the local filesystem and SFTP with progress reporting
 */

import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { Readable, Writable } from "node:stream";
import { logger } from "../utils/logger.js";
import { ErrorCode, RsshError, errnoCode, errorMessage, isRsshError } from "../errors.js";
import type { SftpSession, TransportSession } from "../ssh/types.js";
import { createProgressMeter, notify, silentReporter } from "./progress.js";
import type { ProgressReporter, TransferDescriptor } from "./types.js";
import { TransferDirection } from "./types.js";

/**
 * Base name of a remote path, or undefined when the path names a directory
 */
export function remoteBaseName(remotePath: string): string | undefined {
  if (remotePath.length === 0 || remotePath.endsWith("/")) {
    return undefined;
  }
  const name = path.posix.basename(remotePath);
  if (name === "" || name === "." || name === "..") {
    return undefined;
  }
  return name;
}

function requireRemoteName(remotePath: string): string {
  const fileName = remoteBaseName(remotePath);
  if (!fileName) {
    throw new RsshError(
      ErrorCode.INVALID_REMOTE_PATH,
      `Remote path ${remotePath} is a directory or invalid. Please provide a path to a file to download.`,
      { context: { remotePath } }
    );
  }
  return fileName;
}

async function statOrUndefined(target: string): Promise<fs.Stats | undefined> {
  try {
    return await fsp.stat(target);
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return undefined;
    }
    throw error;
  }
}

/**
 * File Transfer Engine class
 */
export class TransferEngine {
  private reporter: ProgressReporter;

  constructor(reporter: ProgressReporter = silentReporter) {
    this.reporter = reporter;
  }

  /**
   * Local checks of an upload, run before any connection is made. Resolves to the file size.
   */
  public async validateUpload(localPath: string): Promise<number> {
    let stats: fs.Stats | undefined;
    try {
      stats = await statOrUndefined(localPath);
    } catch (error) {
      logger.debug("Cannot stat local path", { localPath, error: errorMessage(error) });
    }
    if (!stats?.isFile()) {
      throw new RsshError(
        ErrorCode.NOT_A_FILE,
        `Local path ${localPath} is not a file. Please provide a path to a file to upload.`,
        { context: { localPath } }
      );
    }
    return stats.size;
  }

  /**
   * Local checks of a download, run before any connection is made.
   * Nothing is created on disk.
   */
  public async validateDownload(remotePath: string, localDir: string): Promise<void> {
    requireRemoteName(remotePath);
    await this.inspectLocalDir(localDir);
  }

  /**
   * Upload a local file into a remote directory, keeping its name.
   * Consumes the session: it is closed when the upload ends.
   */
  public async upload(session: TransportSession, localPath: string, remoteDir: string): Promise<TransferDescriptor> {
    try {
      const transfer: TransferDescriptor = {
        localPath,
        remotePath: path.posix.join(remoteDir, path.basename(localPath)),
        direction: TransferDirection.UPLOAD,
        totalBytes: await this.validateUpload(localPath),
        bytesTransferred: 0,
      };

      logger.info("Uploading file", { localPath, remotePath: transfer.remotePath, size: transfer.totalBytes });

      await this.transfer(session, transfer, async (sftp) => {
        await this.copy(transfer, fs.createReadStream(localPath), sftp.createWriteStream(transfer.remotePath));
      });

      return transfer;
    } finally {
      session.close();
    }
  }

  /**
   * Download a remote file into a local directory, creating the directory if needed.
   * The local checks run before the session is used, and the local file is only
   * created once the remote file is open. Consumes the session.
   */
  public async download(session: TransportSession, remotePath: string, localDir: string): Promise<TransferDescriptor> {
    try {
      const fileName = requireRemoteName(remotePath);
      if (!(await this.inspectLocalDir(localDir))) {
        await this.createLocalDir(localDir);
      }

      const transfer: TransferDescriptor = {
        localPath: path.join(localDir, fileName),
        remotePath,
        direction: TransferDirection.DOWNLOAD,
        totalBytes: 0,
        bytesTransferred: 0,
      };

      logger.info("Downloading file", { remotePath, localPath: transfer.localPath });

      await this.transfer(session, transfer, async (sftp) => {
        const source = await sftp.openReadStream(remotePath);
        try {
          transfer.totalBytes = (await sftp.size(remotePath)) ?? 0;
        } catch (error) {
          source.destroy();
          throw error;
        }
        await this.copy(transfer, source, fs.createWriteStream(transfer.localPath));
      });

      return transfer;
    } finally {
      session.close();
    }
  }

  /**
   * Whether the download destination already exists as a directory
   */
  private async inspectLocalDir(localDir: string): Promise<boolean> {
    let stats: fs.Stats | undefined;
    try {
      stats = await statOrUndefined(localDir);
    } catch (error) {
      throw new RsshError(ErrorCode.TRANSFER_FAILED, `Cannot access ${localDir}: ${errorMessage(error)}`, {
        cause: error,
        context: { localDir },
      });
    }

    if (stats?.isFile()) {
      throw new RsshError(
        ErrorCode.DESTINATION_IS_FILE,
        `Local destination ${localDir} is a file. Please provide a directory path.`,
        { context: { localDir } }
      );
    }

    return stats !== undefined;
  }

  private async createLocalDir(localDir: string): Promise<void> {
    try {
      await fsp.mkdir(localDir, { recursive: true });
    } catch (error) {
      throw new RsshError(
        ErrorCode.TRANSFER_FAILED,
        `Failed to create local directory ${localDir}: ${errorMessage(error)}`,
        { cause: error, context: { localDir } }
      );
    }
  }

  /**
   * Open SFTP, run the copy, and turn any failure into TransferFailed.
   * A partially written destination is left as is.
   */
  private async transfer(
    session: TransportSession,
    transfer: TransferDescriptor,
    run: (sftp: SftpSession) => Promise<void>
  ): Promise<void> {
    let sftp: SftpSession | undefined;
    try {
      sftp = await session.openSftp();
      await run(sftp);
    } catch (error) {
      const upload = transfer.direction === TransferDirection.UPLOAD;
      const subject = upload ? `Upload of ${transfer.localPath}` : `Download of ${transfer.remotePath}`;
      const failure = isRsshError(error)
        ? error
        : new RsshError(ErrorCode.TRANSFER_FAILED, `${subject} failed: ${errorMessage(error)}`, {
            cause: error,
            context: { localPath: transfer.localPath, remotePath: transfer.remotePath },
          });
      logger.info("Transfer failed", { ...failure.context, bytesTransferred: transfer.bytesTransferred });
      notify(() => this.reporter.fail(transfer, failure));
      throw failure;
    } finally {
      sftp?.close();
    }

    logger.info("Transfer complete", {
      direction: transfer.direction,
      remotePath: transfer.remotePath,
      bytes: transfer.bytesTransferred,
    });
    notify(() => this.reporter.finish(transfer));
  }

  private async copy(transfer: TransferDescriptor, source: Readable, sink: Writable): Promise<void> {
    notify(() => this.reporter.start(transfer));
    await pipeline(source, createProgressMeter(transfer, this.reporter), sink);
  }
}
