/**
 * Settings Manager
 * Loads user settings from YAML and merges them over the defaults
 */

import fs from "node:fs/promises";
import yaml from "js-yaml";
import { logger, LogLevel } from "../utils/logger.js";
import { ErrorCode, RsshError, errnoCode, errorMessage } from "../errors.js";
import { validatePort } from "../ssh/target.js";
import type { LoggingSettings, RsshSettings } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { getSettingsPath } from "./paths.js";

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.includes(value);
}

/**
 * Settings Manager class
 */
export class SettingsManager {
  private settings: RsshSettings | null = null;
  private settingsPath: string;

  /**
   * @param settingsPath Optional path to the settings file
   */
  constructor(settingsPath?: string) {
    this.settingsPath = settingsPath ?? getSettingsPath();
  }

  public getSettingsPath(): string {
    return this.settingsPath;
  }

  /**
   * Load settings from file, falling back to defaults when it does not exist
   */
  public async load(): Promise<RsshSettings> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.settingsPath, "utf-8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        logger.debug("Settings file not found, using defaults", { path: this.settingsPath });
        this.settings = this.mergeWithDefaults({});
        return this.settings;
      }
      throw new RsshError(ErrorCode.CONFIG_ERROR, `Failed to read settings: ${errorMessage(error)}`, {
        cause: error,
        context: { path: this.settingsPath },
      });
    }

    let loaded: unknown;
    try {
      loaded = yaml.load(fileContent);
    } catch (error) {
      throw new RsshError(ErrorCode.CONFIG_ERROR, `Settings file is not valid YAML: ${errorMessage(error)}`, {
        cause: error,
        context: { path: this.settingsPath },
      });
    }

    // An empty document loads as undefined
    const raw = loaded ?? {};
    if (!isRecord(raw)) {
      throw new RsshError(ErrorCode.CONFIG_ERROR, "Settings file must contain a mapping", {
        context: { path: this.settingsPath },
      });
    }

    this.settings = this.mergeWithDefaults(raw);

    const { valid, errors } = this.validate(this.settings);
    if (!valid) {
      throw new RsshError(ErrorCode.CONFIG_ERROR, `Invalid settings: ${errors.join("; ")}`, {
        context: { path: this.settingsPath },
      });
    }

    logger.debug("Settings loaded", { path: this.settingsPath });
    return this.settings;
  }

  /**
   * Get the loaded settings
   */
  public get(): RsshSettings {
    if (!this.settings) {
      throw new Error("Settings not loaded. Call load() first.");
    }
    return this.settings;
  }

  /**
   * Validate settings
   */
  public validate(settings: RsshSettings): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const port = validatePort(settings.defaultPort);
    if (!port.valid) {
      errors.push(`defaultPort: ${port.error}`);
    }
    if (!settings.terminalType.trim()) {
      errors.push("terminalType must not be empty");
    }
    if (!Number.isFinite(settings.pollIntervalMs) || settings.pollIntervalMs <= 0) {
      errors.push("pollIntervalMs must be a positive number");
    }
    if (!Number.isFinite(settings.readyTimeout) || settings.readyTimeout <= 0) {
      errors.push("readyTimeout must be a positive number");
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Merge loaded values with defaults.
   * A number given as anything else becomes NaN, which validate() rejects.
   */
  private mergeWithDefaults(raw: Record<string, unknown>): RsshSettings {
    const pickNumber = (key: string, fallback: number): number => {
      const value = raw[key];
      if (value === undefined) return fallback;
      return typeof value === "number" ? value : Number.NaN;
    };

    const loggingRaw = isRecord(raw.logging) ? raw.logging : {};
    const logging: LoggingSettings = {
      ...DEFAULT_SETTINGS.logging,
      ...(loggingRaw.level !== undefined ? { level: this.toLogLevel(loggingRaw.level) } : {}),
      ...(loggingRaw.consoleLevel !== undefined ? { consoleLevel: this.toLogLevel(loggingRaw.consoleLevel) } : {}),
      ...(typeof loggingRaw.logToFile === "boolean" ? { logToFile: loggingRaw.logToFile } : {}),
    };

    return {
      defaultPort: pickNumber("defaultPort", DEFAULT_SETTINGS.defaultPort),
      terminalType: typeof raw.terminalType === "string" ? raw.terminalType : DEFAULT_SETTINGS.terminalType,
      pollIntervalMs: pickNumber("pollIntervalMs", DEFAULT_SETTINGS.pollIntervalMs),
      readyTimeout: pickNumber("readyTimeout", DEFAULT_SETTINGS.readyTimeout),
      savePasswordByDefault:
        typeof raw.savePasswordByDefault === "boolean"
          ? raw.savePasswordByDefault
          : DEFAULT_SETTINGS.savePasswordByDefault,
      logging,
    };
  }

  private toLogLevel(value: unknown): LogLevel {
    if (isLogLevel(value)) {
      return value;
    }
    throw new RsshError(ErrorCode.CONFIG_ERROR, `Unknown log level '${String(value)}'`, {
      context: { path: this.settingsPath },
    });
  }
}
