/**
 * Remove Command
 * Delete a saved connection and its stored password
 */

import chalk from "chalk";
import { getContext } from "../utils/context.js";
import { exitWithError } from "../utils/output.js";

/**
 * Remove command handler
 */
export async function removeCommand(alias: string): Promise<void> {
  try {
    await getContext().aliases.remove(alias);
    console.log(chalk.green(`\n✅ Connection '${alias}' removed.\n`));
  } catch (error) {
    exitWithError("Remove", error);
  }
}
