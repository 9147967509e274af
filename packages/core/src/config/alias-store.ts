/**
 * Alias Store
 * Persists the alias → connection string mapping as JSON
 */

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger.js";
import { ErrorCode, RsshError, errnoCode, errorMessage } from "../errors.js";
import type { AliasRecord, AliasStoreData } from "./types.js";
import { getAliasStorePath } from "./paths.js";

/**
 * Alias mapping: alias → "user@host"
 */
export type AliasMapping = Record<string, string>;

/**
 * Alias Store class
 */
export class AliasStore {
  private storePath: string;

  /**
   * @param storePath Optional path to the store file
   */
  constructor(storePath?: string) {
    this.storePath = storePath ?? getAliasStorePath();
  }

  /**
   * Get the store file path
   */
  public getStorePath(): string {
    return this.storePath;
  }

  /**
   * Load the mapping. A missing file is an empty mapping.
   */
  public async load(): Promise<AliasMapping> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.storePath, "utf-8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        logger.debug("Alias store not found, starting empty", { path: this.storePath });
        return {};
      }
      throw new RsshError(ErrorCode.CONFIG_ERROR, `Failed to read alias store: ${errorMessage(error)}`, {
        cause: error,
        context: { path: this.storePath },
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fileContent);
    } catch (error) {
      throw new RsshError(ErrorCode.CONFIG_ERROR, `Alias store is not valid JSON: ${errorMessage(error)}`, {
        cause: error,
        context: { path: this.storePath },
      });
    }

    if (!parsed || typeof parsed !== "object" || !("connections" in parsed)) {
      throw new RsshError(ErrorCode.CONFIG_ERROR, "Alias store is missing its 'connections' object", {
        context: { path: this.storePath },
      });
    }

    const connections: unknown = parsed.connections;
    if (!connections || typeof connections !== "object" || Array.isArray(connections)) {
      throw new RsshError(ErrorCode.CONFIG_ERROR, "Alias store 'connections' must be an object", {
        context: { path: this.storePath },
      });
    }

    // fromEntries defines own properties, so names such as "__proto__" stay ordinary keys
    const entries: Array<[string, string]> = [];
    for (const [alias, value] of Object.entries(connections)) {
      if (typeof value === "string") {
        entries.push([alias, value]);
      } else {
        logger.warn("Invalid alias entry found in store, skipping", { alias });
      }
    }
    const mapping: AliasMapping = Object.fromEntries(entries);

    logger.debug("Alias store loaded", { path: this.storePath, count: Object.keys(mapping).length });
    return mapping;
  }

  /**
   * Save the mapping, creating the parent directory if needed
   */
  public async save(mapping: AliasMapping): Promise<void> {
    const data: AliasStoreData = { connections: mapping };
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(this.storePath, JSON.stringify(data, null, 2), "utf-8");
    } catch (error) {
      throw new RsshError(ErrorCode.CONFIG_ERROR, `Failed to save alias store: ${errorMessage(error)}`, {
        cause: error,
        context: { path: this.storePath },
      });
    }
    logger.debug("Alias store saved", { path: this.storePath });
  }

  /**
   * Connection string of an alias
   */
  public async get(alias: string): Promise<string | undefined> {
    const mapping = await this.load();
    return Object.hasOwn(mapping, alias) ? mapping[alias] : undefined;
  }

  /**
   * Add or replace an alias
   */
  public async set(alias: string, connectionString: string): Promise<void> {
    const mapping = await this.load();
    await this.save({ ...mapping, [alias]: connectionString });
  }

  /**
   * Remove an alias, returning whether it existed. The store is left untouched when it did not.
   */
  public async delete(alias: string): Promise<boolean> {
    const mapping = await this.load();
    if (!Object.hasOwn(mapping, alias)) {
      return false;
    }
    delete mapping[alias];
    await this.save(mapping);
    return true;
  }

  /**
   * All records, sorted by alias
   */
  public async list(): Promise<AliasRecord[]> {
    const mapping = await this.load();
    return Object.keys(mapping)
      .sort((a, b) => a.localeCompare(b))
      .map((alias) => ({ alias, connectionString: mapping[alias] }));
  }
}
