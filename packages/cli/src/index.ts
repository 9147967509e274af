#!/usr/bin/env node

/**
 * rssh CLI
 * Main entry point
 */

import { Command } from "commander";
import { addCommand } from "./commands/add.js";
import { listCommand } from "./commands/list.js";
import { removeCommand } from "./commands/remove.js";
import { connectCommand } from "./commands/connect.js";
import { uploadCommand } from "./commands/upload.js";
import { downloadCommand } from "./commands/download.js";
import { interactiveCommand } from "./commands/interactive.js";
import { initContext } from "./utils/context.js";
import type { GlobalOptions } from "./utils/context.js";
import { parsePortOption } from "./utils/options.js";
import { exitWithError } from "./utils/output.js";

const program = new Command();

/**
 * CLI Version and description
 */
program
  .name("rssh")
  .description("A secure SSH login management tool")
  .version("1.0.0")
  .option("-v, --verbose", "Print debug logs to the console")
  .hook("preAction", async () => {
    await initContext(program.opts<GlobalOptions>());
  });

/**
 * Add command - Save a connection
 */
program
  .command("add <alias> <connection>")
  .description("Add a new SSH connection (connection in user@host format)")
  .action(addCommand);

/**
 * List command - Show saved connections
 */
program.command("list").description("List all saved SSH connections").action(listCommand);

/**
 * Remove command - Delete a connection and its stored password
 */
program.command("remove <alias>").description("Remove a saved SSH connection").action(removeCommand);

/**
 * Connect command - Interactive shell
 */
program
  .command("connect <alias>")
  .description("Connect to a server using a saved alias")
  .option("-p, --port <port>", "The port to connect to (default from settings: 22)", parsePortOption)
  .option("-i, --identity <path>", "Path to the private key file")
  .action(connectCommand);

/**
 * Upload command - Copy a file to the server
 */
program
  .command("upload <alias> <local-file> <remote-dir>")
  .description("Upload a file to a remote directory")
  .option("-p, --port <port>", "The port to connect to (default from settings: 22)", parsePortOption)
  .option("-i, --identity <path>", "Path to the private key file")
  .action(uploadCommand);

/**
 * Download command - Copy a file from the server
 */
program
  .command("download <alias> <remote-file> <local-dir>")
  .description("Download a file to a local directory")
  .option("-p, --port <port>", "The port to connect to (default from settings: 22)", parsePortOption)
  .option("-i, --identity <path>", "Path to the private key file")
  .action(downloadCommand);

/**
 * No command - Interactive mode
 */
program.action(interactiveCommand);

/**
 * Parse and execute commands
 */
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    exitWithError("rssh", error);
  }
}

void main();

export { program };
