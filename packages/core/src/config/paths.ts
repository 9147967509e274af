import os from "node:os";
import path from "node:path";

/**
 * Per-user rssh directory
 */
export function getRsshHome(): string {
  return path.join(os.homedir(), ".rssh");
}

export function getAliasStorePath(): string {
  return path.join(getRsshHome(), "config.json");
}

export function getSettingsPath(): string {
  return path.join(getRsshHome(), "settings.yaml");
}
