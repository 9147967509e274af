/**
 * Interactive Mode
 * Pick a saved connection, port and key from prompts, then open a shell
 */

import chalk from "chalk";
import inquirer from "inquirer";
import { errorMessage, parsePort } from "@rssh/core";
import { getContext } from "../utils/context.js";
import { exitWithError } from "../utils/output.js";
import { startShell } from "./connect.js";
import { NO_CONNECTIONS_MESSAGE } from "./list.js";

type ConnectionAnswers = {
  alias: string;
  port: string;
  useIdentity: boolean;
};

function validatePortInput(input: string): true | string {
  try {
    parsePort(input);
    return true;
  } catch (error) {
    return errorMessage(error);
  }
}

/**
 * Interactive command handler
 */
export async function interactiveCommand(): Promise<void> {
  try {
    const { settings, aliases } = getContext();
    const records = await aliases.list();

    if (records.length === 0) {
      console.log(chalk.yellow(`\n⚠️  ${NO_CONNECTIONS_MESSAGE}\n`));
      return;
    }

    const answers = await inquirer.prompt<ConnectionAnswers>([
      {
        type: "list",
        name: "alias",
        message: "Select a connection to open:",
        choices: records.map((record) => ({
          name: `${record.alias} ${chalk.gray(`(${record.connectionString})`)}`,
          value: record.alias,
        })),
      },
      {
        type: "input",
        name: "port",
        message: "Enter port:",
        default: String(settings.defaultPort),
        validate: validatePortInput,
      },
      {
        type: "confirm",
        name: "useIdentity",
        message: "Use identity file (private key)?",
        default: false,
      },
    ]);

    let identity: string | undefined;
    if (answers.useIdentity) {
      const { privateKeyPath } = await inquirer.prompt<{ privateKeyPath: string }>([
        {
          type: "input",
          name: "privateKeyPath",
          message: "Enter path to private key:",
          default: "~/.ssh/id_rsa",
          validate: (input: string) => (input.trim() ? true : "Path to private key is required"),
        },
      ]);
      identity = privateKeyPath.trim();
    }

    await startShell(answers.alias, parsePort(answers.port), identity);
  } catch (error) {
    exitWithError("Interactive session", error);
  }
}
