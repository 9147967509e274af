import { describe, expect, it } from "vitest";
import { keyEventFromKeypress, translateKey } from "./keymap.js";
import { KeyEventKind } from "./types.js";
import type { KeyEvent, NamedKey } from "./types.js";

function char(value: string, ctrl = false, kind = KeyEventKind.PRESS): KeyEvent {
  return { type: "key", code: { type: "char", char: value }, ctrl, alt: false, kind };
}

function named(name: NamedKey, kind = KeyEventKind.PRESS): KeyEvent {
  return { type: "key", code: { type: "named", name }, ctrl: false, alt: false, kind };
}

describe("translateKey", () => {
  it.each(Array.from({ length: 0x7e - 0x20 + 1 }, (_, i) => String.fromCharCode(0x20 + i)))(
    "sends printable %j as its own byte",
    (value) => {
      expect(translateKey(char(value))).toEqual(Buffer.from([value.charCodeAt(0)]));
    }
  );

  it("sends other characters as UTF-8", () => {
    expect(translateKey(char("é"))).toEqual(Buffer.from([0xc3, 0xa9]));
  });

  it.each(Array.from({ length: 26 }, (_, i): [string, number] => [String.fromCharCode(0x61 + i), i + 1]))(
    "maps Ctrl+%s to byte %i",
    (letter, byte) => {
      expect(translateKey(char(letter, true))).toEqual(Buffer.from([byte]));
    }
  );

  it.each(["1", "A", "Z", "[", "@", " ", "é"])("sends nothing for Ctrl+%j", (value) => {
    expect(translateKey(char(value, true))).toHaveLength(0);
  });

  it.each<[NamedKey, string]>([
    ["enter", "\r"],
    ["backspace", "\x08"],
    ["left", "\x1b[D"],
    ["right", "\x1b[C"],
    ["up", "\x1b[A"],
    ["down", "\x1b[B"],
    ["tab", "\t"],
    ["escape", "\x1b"],
  ])("maps %s", (name, bytes) => {
    expect(translateKey(named(name))).toEqual(Buffer.from(bytes, "latin1"));
  });

  it.each<NamedKey>(["delete", "home", "end", "pageup", "pagedown", "insert", "unknown"])("sends nothing for %s", (name) => {
    expect(translateKey(named(name))).toHaveLength(0);
  });

  it("ignores repeats and releases", () => {
    expect(translateKey(char("a", false, KeyEventKind.REPEAT))).toHaveLength(0);
    expect(translateKey(named("enter", KeyEventKind.RELEASE))).toHaveLength(0);
  });
});

describe("keyEventFromKeypress", () => {
  it("maps return to enter", () => {
    expect(keyEventFromKeypress("\r", { name: "return", sequence: "\r", ctrl: false, meta: false, shift: false })).toEqual(
      named("enter")
    );
  });

  it("maps Ctrl+C to a control character event", () => {
    const event = keyEventFromKeypress("\x03", { name: "c", sequence: "\x03", ctrl: true, meta: false, shift: false });
    expect(event).toEqual(char("c", true));
  });

  it("keeps the typed character", () => {
    expect(keyEventFromKeypress("A", { name: "a", sequence: "A", ctrl: false, meta: false, shift: true })).toEqual(char("A"));
  });

  it("accepts characters without a key name", () => {
    expect(keyEventFromKeypress("%", undefined)).toEqual(char("%"));
  });

  it("marks unmapped sequences as unknown", () => {
    expect(keyEventFromKeypress("\x1b[15~", { name: "f5", sequence: "\x1b[15~", ctrl: false, meta: false, shift: false })).toEqual(
      named("unknown")
    );
  });

  it("returns nothing for an empty keypress", () => {
    expect(keyEventFromKeypress(undefined, undefined)).toBeUndefined();
  });
});
