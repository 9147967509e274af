/**
 * Transfer Module - SFTP upload and download
 */
export { TransferEngine, remoteBaseName } from "./engine.js";
export { createProgressMeter, silentReporter } from "./progress.js";
export { TransferDirection } from "./types.js";
export type { ProgressReporter, TransferDescriptor } from "./types.js";
