/**
 * Credential Vault
 * Per-alias secrets kept outside the alias store
 */

/**
 * Service name under which every rssh secret is stored
 */
export const VAULT_SERVICE = "rssh";

/**
 * Opaque secret storage keyed by service and alias
 */
export interface CredentialVault {
  /**
   * Stored secret, or `undefined` when there is none
   */
  getSecret(service: string, alias: string): Promise<string | undefined>;

  setSecret(service: string, alias: string, secret: string): Promise<void>;

  /**
   * Delete a secret. Deleting a secret that does not exist succeeds.
   */
  deleteSecret(service: string, alias: string): Promise<void>;
}
