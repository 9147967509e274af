/**
 * Config Module - Saved aliases and user settings
 */
export { AliasStore } from "./alias-store.js";
export type { AliasMapping } from "./alias-store.js";
export { AliasManager } from "./alias-manager.js";
export { SettingsManager } from "./settings.js";
export { getRsshHome, getAliasStorePath, getSettingsPath } from "./paths.js";
export type { AliasRecord, AliasStoreData, LoggingSettings, RsshSettings } from "./types.js";
export { DEFAULT_SETTINGS } from "./types.js";
