/**
 * Transfer progress on an ora spinner
 */

import path from "node:path";
import chalk from "chalk";
import ora from "ora";
import type { Ora } from "ora";
import { TransferDirection, formatBytes, formatPercent } from "@rssh/core";
import type { ProgressReporter, TransferDescriptor } from "@rssh/core";

function fileName(transfer: Readonly<TransferDescriptor>): string {
  return transfer.direction === TransferDirection.UPLOAD
    ? path.basename(transfer.localPath)
    : path.posix.basename(transfer.remotePath);
}

/**
 * "Uploading report.txt 45% (461 B / 1.0 KB)", or "Downloading x.bin 1.2 KB" without a known total
 */
export function describeProgress(transfer: Readonly<TransferDescriptor>): string {
  const verb = transfer.direction === TransferDirection.UPLOAD ? "Uploading" : "Downloading";
  const done = formatBytes(transfer.bytesTransferred);
  const percent = formatPercent(transfer.bytesTransferred, transfer.totalBytes);

  if (percent === undefined) {
    return `${verb} ${fileName(transfer)} ${done}`;
  }
  return `${verb} ${fileName(transfer)} ${percent} (${done} / ${formatBytes(transfer.totalBytes)})`;
}

/**
 * "Uploaded report.txt to /home/u/in/report.txt (1.0 KB)"
 */
export function describeCompletion(transfer: Readonly<TransferDescriptor>): string {
  const upload = transfer.direction === TransferDirection.UPLOAD;
  const destination = upload ? transfer.remotePath : transfer.localPath;
  const verb = upload ? "Uploaded" : "Downloaded";
  return `${verb} ${fileName(transfer)} to ${destination} (${formatBytes(transfer.bytesTransferred)})`;
}

export class SpinnerReporter implements ProgressReporter {
  private spinner: Ora | undefined;

  public start(transfer: Readonly<TransferDescriptor>): void {
    this.spinner = ora(describeProgress(transfer)).start();
  }

  public update(transfer: Readonly<TransferDescriptor>): void {
    if (this.spinner) {
      this.spinner.text = describeProgress(transfer);
    }
  }

  public finish(transfer: Readonly<TransferDescriptor>): void {
    this.spinner?.succeed(chalk.green(describeCompletion(transfer)));
    this.spinner = undefined;
  }

  public fail(transfer: Readonly<TransferDescriptor>): void {
    this.spinner?.fail(chalk.red(`${describeProgress(transfer)} failed`));
    this.spinner = undefined;
  }
}
