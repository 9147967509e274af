/**
 * Configuration Module Types
 */

import { LogLevel } from "../utils/logger.js";

/**
 * A saved connection
 */
export interface AliasRecord {
  alias: string;
  connectionString: string;
}

/**
 * On-disk shape of the alias store
 */
export interface AliasStoreData {
  connections: Record<string, string>;
}

/**
 * Logging section of the settings file
 */
export interface LoggingSettings {
  level: LogLevel;
  consoleLevel: LogLevel;
  logToFile: boolean;
}

/**
 * User settings (~/.rssh/settings.yaml)
 */
export interface RsshSettings {
  /** Port used when a command gives none */
  defaultPort: number;
  /** TERM requested for the remote pseudo-terminal */
  terminalType: string;
  /** Input polling interval of the interactive shell */
  pollIntervalMs: number;
  /** Milliseconds to wait for the SSH handshake to complete */
  readyTimeout: number;
  /** Default answer of the "save password?" question */
  savePasswordByDefault: boolean;
  logging: LoggingSettings;
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: RsshSettings = {
  defaultPort: 22,
  terminalType: "xterm-256color",
  pollIntervalMs: 10,
  readyTimeout: 20000,
  savePasswordByDefault: true,
  logging: {
    level: LogLevel.INFO,
    consoleLevel: LogLevel.WARN,
    logToFile: true,
  },
};
