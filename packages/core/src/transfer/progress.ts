/**
 * Progress metering for transfer streams
 */

import { Transform } from "node:stream";
import type { TransformCallback } from "node:stream";
import { logger } from "../utils/logger.js";
import type { ProgressReporter, TransferDescriptor } from "./types.js";

/**
 * Reporter that reports nothing
 */
export const silentReporter: ProgressReporter = {
  start: () => undefined,
  update: () => undefined,
  finish: () => undefined,
  fail: () => undefined,
};

/**
 * Pass-through stream counting bytes into the descriptor.
 * A throwing reporter is logged and otherwise ignored.
 */
export function createProgressMeter(transfer: TransferDescriptor, reporter: ProgressReporter): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      transfer.bytesTransferred += chunk.length;
      notify(() => reporter.update(transfer));
      callback(null, chunk);
    },
  });
}

/**
 * Call a reporter hook without letting it break the transfer
 */
export function notify(report: () => void): void {
  try {
    report();
  } catch (error) {
    logger.debug("Progress reporter failed", { error });
  }
}
