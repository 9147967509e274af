/**
 * Interactive Shell Multiplexer
 * Runs a remote shell against the local terminal in a cooperative poll loop
 */

import { logger } from "../utils/logger.js";
import { ErrorCode, RsshError, errorMessage } from "../errors.js";
import { formatTarget } from "../ssh/target.js";
import type { ShellChannel, TransportSession } from "../ssh/types.js";
import { translateKey } from "./keymap.js";
import type { Display, InputSource, ShellIo, ShellOptions, TerminalEvent } from "./types.js";

export const DEFAULT_POLL_INTERVAL_MS = 10;
export const DEFAULT_TERM = "xterm-256color";

/**
 * Open a shell on the session and pump bytes until the remote side closes it.
 * The session, channel and input are closed and the terminal mode restored on every exit path.
 */
export async function runShell(session: TransportSession, io: ShellIo, options: ShellOptions = {}): Promise<void> {
  const term = options.term ?? DEFAULT_TERM;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const target = formatTarget(session.target);

  let channel: ShellChannel | undefined;
  try {
    channel = await session.openShell(io.terminal.size(), term);
    logger.info("Shell started", { target, term });

    const guard = io.terminal.enterRawMode();
    try {
      await pump(channel, io.input, io.display, pollIntervalMs);
    } finally {
      guard.release();
    }

    logger.info("Remote shell closed", { target });
  } finally {
    channel?.close();
    io.input.close();
    session.close();
  }
}

/**
 * The poll loop: one input event per tick, then everything the channel has pending.
 * Returns on remote EOF, throws ChannelReadError on any other read failure.
 */
export async function pump(
  channel: ShellChannel,
  input: InputSource,
  display: Display,
  pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS
): Promise<void> {
  for (;;) {
    const event = await input.poll(pollIntervalMs);
    if (event) {
      forwardEvent(channel, event);
    }

    for (;;) {
      let chunk: Buffer | undefined;
      try {
        chunk = channel.read();
      } catch (error) {
        throw new RsshError(ErrorCode.CHANNEL_READ_ERROR, `Channel read error: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      if (chunk === undefined) {
        // Would block: back to input
        break;
      }
      if (chunk.length === 0) {
        return;
      }
      display.write(chunk);
    }
  }
}

function forwardEvent(channel: ShellChannel, event: TerminalEvent): void {
  switch (event.type) {
    case "key": {
      const bytes = translateKey(event);
      if (bytes.length > 0) {
        channel.write(bytes);
      }
      break;
    }
    case "resize":
      channel.resize({ cols: event.cols, rows: event.rows });
      break;
  }
}
