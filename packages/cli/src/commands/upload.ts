/**
 * Upload Command
 * Copy a local file into a remote directory
 */

import { TransferEngine } from "@rssh/core";
import { getContext } from "../utils/context.js";
import { resolveIdentityPath } from "../utils/options.js";
import type { SessionOptions } from "../utils/options.js";
import { exitWithError } from "../utils/output.js";
import { SpinnerReporter } from "../utils/progress.js";

/**
 * Upload command handler
 */
export async function uploadCommand(
  alias: string,
  localPath: string,
  remoteDir: string,
  options: SessionOptions
): Promise<void> {
  try {
    const { settings, sessions } = getContext();
    const engine = new TransferEngine(new SpinnerReporter());
    // Checked before connecting
    await engine.validateUpload(localPath);

    const session = await sessions.establishSession(
      alias,
      options.port ?? settings.defaultPort,
      resolveIdentityPath(options.identity)
    );

    await engine.upload(session, localPath, remoteDir);
  } catch (error) {
    exitWithError("Upload", error);
  }
}
