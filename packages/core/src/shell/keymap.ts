/**
 * Key translation
 * Maps local key events to the bytes a remote pseudo-terminal expects
 */

import type { Key } from "node:readline";
import type { KeyCode, KeyEvent, NamedKey } from "./types.js";
import { KeyEventKind } from "./types.js";

const NONE = Buffer.alloc(0);

const NAMED_KEY_BYTES: Partial<Record<NamedKey, string>> = {
  enter: "\r",
  backspace: "\x08",
  left: "\x1b[D",
  right: "\x1b[C",
  up: "\x1b[A",
  down: "\x1b[B",
  tab: "\t",
  escape: "\x1b",
};

/**
 * Bytes to send for a key event; empty for anything without a mapping.
 * Only presses produce bytes.
 */
export function translateKey(event: KeyEvent): Buffer {
  if (event.kind !== KeyEventKind.PRESS) {
    return NONE;
  }

  const { code } = event;
  if (code.type === "char") {
    if (event.ctrl) {
      // Ctrl+a..z → 0x01..0x1a
      return /^[a-z]$/.test(code.char) ? Buffer.from([code.char.charCodeAt(0) - 0x61 + 1]) : NONE;
    }
    return Buffer.from(code.char, "utf8");
  }

  const bytes = NAMED_KEY_BYTES[code.name];
  return bytes === undefined ? NONE : Buffer.from(bytes, "latin1");
}

const NODE_KEY_NAMES: Record<string, NamedKey> = {
  return: "enter",
  enter: "enter",
  backspace: "backspace",
  left: "left",
  right: "right",
  up: "up",
  down: "down",
  tab: "tab",
  escape: "escape",
  delete: "delete",
  home: "home",
  end: "end",
  pageup: "pageup",
  pagedown: "pagedown",
  insert: "insert",
};

/**
 * Build a key event from a `keypress` emitted by readline.emitKeypressEvents.
 * Terminals only report presses.
 */
export function keyEventFromKeypress(sequence: string | undefined, key: Key | undefined): KeyEvent | undefined {
  const ctrl = key?.ctrl ?? false;
  const alt = key?.meta ?? false;
  const name = key?.name;

  let code: KeyCode | undefined;
  if (name !== undefined && Object.hasOwn(NODE_KEY_NAMES, name)) {
    code = { type: "named", name: NODE_KEY_NAMES[name] };
  } else if (ctrl && name !== undefined && name.length === 1) {
    code = { type: "char", char: name };
  } else if (sequence !== undefined && isPrintable(sequence)) {
    code = { type: "char", char: sequence };
  } else if (sequence !== undefined || name !== undefined) {
    code = { type: "named", name: "unknown" };
  }

  if (!code) {
    return undefined;
  }
  return { type: "key", code, ctrl, alt, kind: KeyEventKind.PRESS };
}

/**
 * A single character that is not a control code
 */
function isPrintable(sequence: string): boolean {
  const chars = [...sequence];
  if (chars.length !== 1) {
    return false;
  }
  const codePoint = chars[0].codePointAt(0) ?? 0;
  return codePoint >= 0x20 && codePoint !== 0x7f;
}
