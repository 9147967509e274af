/**
 * Add Command
 * Save a connection under an alias
 */

import chalk from "chalk";
import { getContext } from "../utils/context.js";
import { exitWithError } from "../utils/output.js";

/**
 * Add command handler
 */
export async function addCommand(alias: string, connectionString: string): Promise<void> {
  try {
    const { aliases } = getContext();
    const replaced = await aliases.add(alias, connectionString);

    console.log(chalk.green(`\n✅ Connection '${alias}' ${replaced ? "updated" : "added"}.\n`));
  } catch (error) {
    exitWithError("Add", error);
  }
}
