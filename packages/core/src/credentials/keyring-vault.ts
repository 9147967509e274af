/**
 * Keyring Vault
 * Credential vault backed by the OS credential store (Keychain, Credential Manager, Secret Service)
 */

import { Entry } from "@napi-rs/keyring";
import { logger } from "../utils/logger.js";
import { ErrorCode, RsshError, errorMessage } from "../errors.js";
import type { CredentialVault } from "./vault.js";

/**
 * The OS store reports a missing entry as an error on some platforms
 */
function isNoEntryError(error: unknown): boolean {
  return /no (matching )?entry|not found/i.test(errorMessage(error));
}

export class KeyringVault implements CredentialVault {
  public async getSecret(service: string, alias: string): Promise<string | undefined> {
    try {
      const secret = new Entry(service, alias).getPassword();
      return secret ?? undefined;
    } catch (error) {
      if (isNoEntryError(error)) {
        return undefined;
      }
      throw this.storeError(`Failed to retrieve password for '${alias}'`, alias, error);
    }
  }

  public async setSecret(service: string, alias: string, secret: string): Promise<void> {
    try {
      new Entry(service, alias).setPassword(secret);
      logger.info("Password saved to credential store", { alias });
    } catch (error) {
      throw this.storeError(`Failed to save password for '${alias}'`, alias, error);
    }
  }

  public async deleteSecret(service: string, alias: string): Promise<void> {
    try {
      new Entry(service, alias).deletePassword();
      logger.info("Password removed from credential store", { alias });
    } catch (error) {
      if (isNoEntryError(error)) {
        logger.debug("No stored password to remove", { alias });
        return;
      }
      throw this.storeError(`Failed to delete password for '${alias}'`, alias, error);
    }
  }

  private storeError(message: string, alias: string, cause: unknown): RsshError {
    return new RsshError(ErrorCode.CREDENTIAL_STORE_ERROR, `${message}: ${errorMessage(cause)}`, {
      cause,
      context: { alias },
    });
  }
}
