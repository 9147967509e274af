/**
 * Alias Manager
 * High-level alias operations: validation on add, vault cleanup on remove
 */

import { logger } from "../utils/logger.js";
import { ErrorCode, RsshError } from "../errors.js";
import { parseConnectionString } from "../ssh/target.js";
import { VAULT_SERVICE } from "../credentials/vault.js";
import type { CredentialVault } from "../credentials/vault.js";
import { AliasStore } from "./alias-store.js";
import type { AliasRecord } from "./types.js";

/**
 * Validate an alias name
 */
function validateAlias(alias: string): { valid: boolean; error?: string } {
  if (!alias || alias.trim().length === 0) {
    return { valid: false, error: "Alias cannot be empty" };
  }

  if (alias !== alias.trim()) {
    return { valid: false, error: "Alias cannot start or end with whitespace" };
  }

  return { valid: true };
}

/**
 * Alias Manager class
 */
export class AliasManager {
  private store: AliasStore;
  private vault: CredentialVault;

  constructor(store: AliasStore, vault: CredentialVault) {
    this.store = store;
    this.vault = vault;
  }

  /**
   * Get the underlying store
   */
  public getStore(): AliasStore {
    return this.store;
  }

  /**
   * Save a connection under an alias, replacing any previous one.
   * @returns true when an existing alias was replaced
   */
  public async add(alias: string, connectionString: string): Promise<boolean> {
    const validation = validateAlias(alias);
    if (!validation.valid) {
      throw new RsshError(ErrorCode.INVALID_ARGUMENT, validation.error ?? "Invalid alias", { context: { alias } });
    }

    // Refuse strings that could never be connected to
    parseConnectionString(connectionString);

    const replaced = (await this.store.get(alias)) !== undefined;
    await this.store.set(alias, connectionString);

    logger.info(replaced ? "Alias updated" : "Alias added", { alias, connectionString });
    return replaced;
  }

  /**
   * All saved connections, sorted by alias
   */
  public async list(): Promise<AliasRecord[]> {
    return this.store.list();
  }

  /**
   * Connection string of an alias
   */
  public async resolve(alias: string): Promise<string> {
    const connectionString = await this.store.get(alias);
    if (connectionString === undefined) {
      throw new RsshError(ErrorCode.ALIAS_NOT_FOUND, `Alias '${alias}' not found.`, { context: { alias } });
    }
    return connectionString;
  }

  /**
   * Remove an alias and its stored password.
   * The alias is removed first; a vault failure afterwards still fails the call.
   */
  public async remove(alias: string): Promise<void> {
    const existed = await this.store.delete(alias);
    if (!existed) {
      throw new RsshError(ErrorCode.ALIAS_NOT_FOUND, `Alias '${alias}' not found.`, { context: { alias } });
    }

    logger.info("Alias removed", { alias });
    await this.vault.deleteSecret(VAULT_SERVICE, alias);
  }
}
