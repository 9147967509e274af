/**
 * Shell Module - Interactive remote shell on the local terminal
 */
export { runShell, pump, DEFAULT_POLL_INTERVAL_MS, DEFAULT_TERM } from "./multiplexer.js";
export { translateKey, keyEventFromKeypress } from "./keymap.js";
export { KeypressInput, ProcessTerminal, RawModeGuard, StreamDisplay } from "./terminal.js";
export type { RawModeStream, TerminalOutput } from "./terminal.js";
export { KeyEventKind } from "./types.js";
export type {
  Display,
  InputSource,
  KeyCode,
  KeyEvent,
  NamedKey,
  ResizeEvent,
  ShellIo,
  ShellOptions,
  TerminalControl,
  TerminalEvent,
  TerminalModeGuard,
} from "./types.js";
