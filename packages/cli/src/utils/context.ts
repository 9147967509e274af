/**
 * CLI Context
 * Settings, logging and the core services shared by every command
 */

import chalk from "chalk";
import {
  AliasManager,
  AliasStore,
  KeyringVault,
  LogLevel,
  NodeSshTransport,
  SessionBuilder,
  SessionEvent,
  SettingsManager,
  initLogger,
  logger,
} from "@rssh/core";
import type { ConnectionTarget, RsshSettings } from "@rssh/core";
import { InquirerPrompter } from "./prompter.js";

export interface CliContext {
  settings: RsshSettings;
  aliases: AliasManager;
  sessions: SessionBuilder;
}

export type GlobalOptions = {
  verbose?: boolean;
};

let context: CliContext | undefined;

/**
 * Load settings, configure logging and wire the core services
 */
export async function initContext(options: GlobalOptions = {}): Promise<CliContext> {
  const settings = await new SettingsManager().load();

  initLogger({
    level: options.verbose ? LogLevel.DEBUG : settings.logging.level,
    consoleLevel: options.verbose ? LogLevel.DEBUG : settings.logging.consoleLevel,
    logToFile: settings.logging.logToFile,
  });

  const store = new AliasStore();
  const vault = new KeyringVault();

  context = {
    settings,
    aliases: new AliasManager(store, vault),
    sessions: new SessionBuilder({
      aliases: store,
      vault,
      transport: new NodeSshTransport({ readyTimeout: settings.readyTimeout }),
      prompter: new InquirerPrompter(settings.savePasswordByDefault),
      listener: printSessionEvent,
    }),
  };

  logger.debug("CLI initialized", { verbose: options.verbose ?? false, store: store.getStorePath() });
  return context;
}

/**
 * Get the context set up by initContext()
 */
export function getContext(): CliContext {
  if (!context) {
    throw new Error("CLI context not initialized. Call initContext() first.");
  }
  return context;
}

function printSessionEvent(event: SessionEvent, target: ConnectionTarget): void {
  switch (event) {
    case SessionEvent.CONNECTING:
      console.log(chalk.cyan(`Connecting to ${target.user}@${target.host}:${target.port}`));
      break;
    case SessionEvent.AUTHENTICATED:
      console.log(chalk.green("Successfully connected!"));
      break;
  }
}
