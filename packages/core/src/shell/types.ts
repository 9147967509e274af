/**
 * Shell Module Types
 */

import type { PtySize } from "../ssh/types.js";

/**
 * Keys with a name rather than a character
 */
export type NamedKey =
  | "enter"
  | "backspace"
  | "left"
  | "right"
  | "up"
  | "down"
  | "tab"
  | "escape"
  | "delete"
  | "home"
  | "end"
  | "pageup"
  | "pagedown"
  | "insert"
  | "unknown";

export type KeyCode = { type: "char"; char: string } | { type: "named"; name: NamedKey };

export enum KeyEventKind {
  PRESS = "press",
  REPEAT = "repeat",
  RELEASE = "release",
}

export interface KeyEvent {
  type: "key";
  code: KeyCode;
  ctrl: boolean;
  alt: boolean;
  kind: KeyEventKind;
}

export interface ResizeEvent extends PtySize {
  type: "resize";
}

export type TerminalEvent = KeyEvent | ResizeEvent;

/**
 * Local input, polled with a bounded wait
 */
export interface InputSource {
  /**
   * Next event, waiting at most `timeoutMs`; `undefined` when none arrived
   */
  poll(timeoutMs: number): Promise<TerminalEvent | undefined>;

  close(): void;
}

/**
 * Where remote output is shown
 */
export interface Display {
  write(chunk: Buffer): void;
}

/**
 * Restores the terminal mode it replaced; releasing twice is a no-op
 */
export interface TerminalModeGuard {
  release(): void;
}

/**
 * Local terminal state
 */
export interface TerminalControl {
  size(): PtySize;

  /**
   * Switch to raw mode (no line buffering, no echo)
   */
  enterRawMode(): TerminalModeGuard;
}

/**
 * Everything the shell loop talks to locally
 */
export interface ShellIo {
  input: InputSource;
  display: Display;
  terminal: TerminalControl;
}

export interface ShellOptions {
  /** TERM of the remote pseudo-terminal */
  term?: string;
  /** Input polling interval */
  pollIntervalMs?: number;
}
