/**
 * Credentials Module - Secret storage for saved connections
 */
export { VAULT_SERVICE } from "./vault.js";
export type { CredentialVault } from "./vault.js";
export { KeyringVault } from "./keyring-vault.js";
