/**
 * Transfer Module Types
 */

export enum TransferDirection {
  UPLOAD = "upload",
  DOWNLOAD = "download",
}

/**
 * One file transfer. `bytesTransferred` only ever grows.
 */
export interface TransferDescriptor {
  localPath: string;
  remotePath: string;
  direction: TransferDirection;
  /** 0 when the size is unknown */
  totalBytes: number;
  bytesTransferred: number;
}

/**
 * Receives transfer progress. Purely informational: it cannot affect the transfer.
 */
export interface ProgressReporter {
  start(transfer: Readonly<TransferDescriptor>): void;
  update(transfer: Readonly<TransferDescriptor>): void;
  finish(transfer: Readonly<TransferDescriptor>): void;
  fail(transfer: Readonly<TransferDescriptor>, error: Error): void;
}
