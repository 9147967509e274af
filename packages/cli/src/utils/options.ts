/**
 * Command line option parsing
 */

import os from "node:os";
import path from "node:path";
import { InvalidArgumentError } from "commander";
import { errorMessage, parsePort } from "@rssh/core";

/**
 * Options shared by connect, upload and download
 */
export interface SessionOptions {
  port?: number;
  identity?: string;
}

/**
 * commander argument parser for --port
 */
export function parsePortOption(value: string): number {
  try {
    return parsePort(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

/**
 * Expand a leading ~ in a private key path
 */
export function resolveIdentityPath(identity: string | undefined): string | undefined {
  if (!identity) {
    return undefined;
  }
  if (identity === "~" || identity.startsWith("~/")) {
    return path.join(os.homedir(), identity.slice(1));
  }
  return identity;
}
