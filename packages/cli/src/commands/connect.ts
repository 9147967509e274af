/**
 * Connect Command
 * Open an interactive shell on a saved connection
 */

import { KeypressInput, ProcessTerminal, StreamDisplay, runShell } from "@rssh/core";
import { getContext } from "../utils/context.js";
import { resolveIdentityPath } from "../utils/options.js";
import type { SessionOptions } from "../utils/options.js";
import { exitWithError } from "../utils/output.js";

/**
 * Authenticate and run the shell until the remote side closes it
 */
export async function startShell(alias: string, port: number, identity?: string): Promise<void> {
  const { settings, sessions } = getContext();
  const session = await sessions.establishSession(alias, port, resolveIdentityPath(identity));

  await runShell(
    session,
    {
      input: new KeypressInput(),
      display: new StreamDisplay(),
      terminal: new ProcessTerminal(),
    },
    { term: settings.terminalType, pollIntervalMs: settings.pollIntervalMs }
  );
}

/**
 * Connect command handler
 */
export async function connectCommand(alias: string, options: SessionOptions): Promise<void> {
  try {
    await startShell(alias, options.port ?? getContext().settings.defaultPort, options.identity);
  } catch (error) {
    exitWithError("Connect", error);
  }
}
