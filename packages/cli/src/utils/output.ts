/**
 * Failure output
 */

import chalk from "chalk";
import { errorMessage, isRsshError, logger } from "@rssh/core";

/**
 * Log the failure, print it to stderr and exit with status 1
 */
export function exitWithError(action: string, error: unknown): never {
  logger.error(`${action} failed`, {
    error: errorMessage(error),
    ...(isRsshError(error) ? { code: error.code, ...error.context } : {}),
  });
  console.error(chalk.red(`\n❌ ${errorMessage(error)}\n`));
  process.exit(1);
}
