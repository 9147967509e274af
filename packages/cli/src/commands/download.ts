/**
 * Download Command
 * Copy a remote file into a local directory
 */

import { TransferEngine } from "@rssh/core";
import { getContext } from "../utils/context.js";
import { resolveIdentityPath } from "../utils/options.js";
import type { SessionOptions } from "../utils/options.js";
import { exitWithError } from "../utils/output.js";
import { SpinnerReporter } from "../utils/progress.js";

/**
 * Download command handler
 */
export async function downloadCommand(
  alias: string,
  remotePath: string,
  localDir: string,
  options: SessionOptions
): Promise<void> {
  try {
    const { settings, sessions } = getContext();
    const engine = new TransferEngine(new SpinnerReporter());
    // Checked before connecting
    await engine.validateDownload(remotePath, localDir);

    const session = await sessions.establishSession(
      alias,
      options.port ?? settings.defaultPort,
      resolveIdentityPath(options.identity)
    );

    await engine.download(session, remotePath, localDir);
  } catch (error) {
    exitWithError("Download", error);
  }
}
