/**
 * List Command
 * Show every saved connection
 */

import chalk from "chalk";
import { getContext } from "../utils/context.js";
import { exitWithError } from "../utils/output.js";

export const NO_CONNECTIONS_MESSAGE = "No connections saved. Use 'rssh add <alias> <user@host>' to add one.";

/**
 * List command handler
 */
export async function listCommand(): Promise<void> {
  try {
    const records = await getContext().aliases.list();

    if (records.length === 0) {
      console.log(chalk.yellow(`\n⚠️  ${NO_CONNECTIONS_MESSAGE}\n`));
      return;
    }

    console.log(chalk.bold.cyan("\nSaved connections:\n"));
    const width = Math.max(...records.map((record) => record.alias.length));
    for (const record of records) {
      console.log(`  ${chalk.cyan(record.alias.padEnd(width))} -> ${record.connectionString}`);
    }
    console.log();
  } catch (error) {
    exitWithError("List", error);
  }
}
