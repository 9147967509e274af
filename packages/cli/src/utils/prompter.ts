/**
 * Credential prompts on the terminal
 */

import inquirer from "inquirer";
import type { CredentialPrompter } from "@rssh/core";

export class InquirerPrompter implements CredentialPrompter {
  private savePasswordByDefault: boolean;

  constructor(savePasswordByDefault = true) {
    this.savePasswordByDefault = savePasswordByDefault;
  }

  public async promptPassphrase(privateKeyPath: string): Promise<string> {
    const { passphrase } = await inquirer.prompt<{ passphrase: string }>([
      {
        type: "password",
        name: "passphrase",
        message: `Enter passphrase for key ${privateKeyPath}:`,
        mask: "*",
      },
    ]);
    return passphrase;
  }

  public async promptPassword(connectionString: string): Promise<string | undefined> {
    const { password } = await inquirer.prompt<{ password: string }>([
      {
        type: "password",
        name: "password",
        message: `Enter password for ${connectionString}:`,
        mask: "*",
      },
    ]);
    return password || undefined;
  }

  public async confirmSavePassword(alias: string): Promise<boolean> {
    const { save } = await inquirer.prompt<{ save: boolean }>([
      {
        type: "confirm",
        name: "save",
        message: `Save password for '${alias}' to the system keychain?`,
        default: this.savePasswordByDefault,
      },
    ]);
    return save;
  }
}
