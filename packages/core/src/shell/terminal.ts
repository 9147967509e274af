/**
 * Local terminal
 * Raw mode guard, keypress input and display on the process streams
 */

import readline from "node:readline";
import type { Key } from "node:readline";
import { logger } from "../utils/logger.js";
import type { PtySize } from "../ssh/types.js";
import { keyEventFromKeypress } from "./keymap.js";
import type { Display, InputSource, TerminalControl, TerminalEvent, TerminalModeGuard } from "./types.js";

const DEFAULT_SIZE: PtySize = { cols: 80, rows: 24 };

const RESTORE_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGHUP"];

/**
 * The parts of a TTY stream the raw mode guard needs
 */
export interface RawModeStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Puts a TTY into raw mode and restores its previous mode exactly once:
 * on release(), on process exit, or on SIGTERM/SIGHUP.
 */
export class RawModeGuard implements TerminalModeGuard {
  private stream: RawModeStream;
  private previous: boolean;
  private released = false;

  constructor(stream: RawModeStream) {
    this.stream = stream;
    this.previous = stream.isRaw ?? false;

    if (stream.isTTY && stream.setRawMode) {
      stream.setRawMode(true);
    }

    process.once("exit", this.release);
    for (const signal of RESTORE_SIGNALS) {
      process.once(signal, this.onSignal);
    }
  }

  public isReleased(): boolean {
    return this.released;
  }

  public release = (): void => {
    if (this.released) {
      return;
    }
    this.released = true;

    process.removeListener("exit", this.release);
    for (const signal of RESTORE_SIGNALS) {
      process.removeListener(signal, this.onSignal);
    }

    if (this.stream.isTTY && this.stream.setRawMode) {
      this.stream.setRawMode(this.previous);
    }
  };

  private onSignal = (signal: NodeJS.Signals): void => {
    this.release();
    // Listeners are gone now, so this takes the default action
    process.kill(process.pid, signal);
  };
}

/**
 * The terminal stream that reports its size
 */
export interface TerminalOutput {
  columns?: number;
  rows?: number;
  on(event: "resize", listener: () => void): unknown;
  removeListener(event: "resize", listener: () => void): unknown;
}

/**
 * Keypress and resize events from the process streams
 */
export class KeypressInput implements InputSource {
  private input: NodeJS.ReadableStream;
  private output: TerminalOutput;
  private queue: TerminalEvent[] = [];
  private waiter: ((event: TerminalEvent | undefined) => void) | undefined;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: TerminalOutput = process.stdout) {
    this.input = input;
    this.output = output;

    readline.emitKeypressEvents(input);
    input.on("keypress", this.onKeypress);
    output.on("resize", this.onResize);
    input.resume();
  }

  public poll(timeoutMs: number): Promise<TerminalEvent | undefined> {
    const queued = this.queue.shift();
    if (queued || this.closed) {
      return Promise.resolve(queued);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(undefined);
      }, timeoutMs);

      this.waiter = (event) => {
        clearTimeout(timer);
        this.waiter = undefined;
        resolve(event);
      };
    });
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.input.removeListener("keypress", this.onKeypress);
    this.output.removeListener("resize", this.onResize);
    this.input.pause();
    this.waiter?.(undefined);
  }

  private push(event: TerminalEvent): void {
    if (this.waiter) {
      this.waiter(event);
    } else {
      this.queue.push(event);
    }
  }

  private onKeypress = (sequence: string | undefined, key: Key | undefined): void => {
    const event = keyEventFromKeypress(sequence, key);
    if (event) {
      this.push(event);
    }
  };

  private onResize = (): void => {
    const size = terminalSize(this.output);
    logger.debug("Terminal resized", size);
    this.push({ type: "resize", ...size });
  };
}

function terminalSize(output: TerminalOutput): PtySize {
  return {
    cols: output.columns || DEFAULT_SIZE.cols,
    rows: output.rows || DEFAULT_SIZE.rows,
  };
}

/**
 * TerminalControl on the process streams
 */
export class ProcessTerminal implements TerminalControl {
  private input: RawModeStream;
  private output: TerminalOutput;

  constructor(input: RawModeStream = process.stdin, output: TerminalOutput = process.stdout) {
    this.input = input;
    this.output = output;
  }

  public size(): PtySize {
    return terminalSize(this.output);
  }

  public enterRawMode(): TerminalModeGuard {
    return new RawModeGuard(this.input);
  }
}

/**
 * Display writing straight to a stream
 */
export class StreamDisplay implements Display {
  private output: NodeJS.WritableStream;

  constructor(output: NodeJS.WritableStream = process.stdout) {
    this.output = output;
  }

  public write(chunk: Buffer): void {
    this.output.write(chunk);
  }
}
