import type { Key } from "node:readline";

/**
 * A normalized key press. `name` is "enter", "esc", "up", "space", ... or the
 * typed character itself when the terminal reports no name for it.
 */
export interface KeyPress {
  name: string;
  char?: string;
  ctrl?: boolean;
  meta?: boolean;
}

const RENAMED: Record<string, string> = {
  return: "enter",
  escape: "esc",
};

/**
 * Convert a readline keypress into a KeyPress
 */
export function fromReadline(char: string | undefined, key: Key | undefined): KeyPress {
  const rawName = key?.name ?? char ?? "";
  const name = RENAMED[rawName] ?? rawName;

  return {
    name,
    char: char !== undefined && char.length === 1 ? char : undefined,
    ctrl: key?.ctrl ?? false,
    meta: key?.meta ?? false,
  };
}

/**
 * Build a KeyPress for a named key or a single typed character
 */
export function key(name: string, modifiers: { ctrl?: boolean; meta?: boolean } = {}): KeyPress {
  if (name.length === 1) {
    return { name: name.toLowerCase(), char: name, ...modifiers };
  }
  if (name === "space") {
    return { name, char: " ", ...modifiers };
  }
  return { name, ...modifiers };
}

export function isKey(press: KeyPress, ...names: string[]): boolean {
  return !press.ctrl && !press.meta && names.includes(press.name);
}

/**
 * Match a typed character exactly, so "y" and "Y" can be told apart
 */
export function isChar(press: KeyPress, ...chars: string[]): boolean {
  return !press.ctrl && !press.meta && press.char !== undefined && chars.includes(press.char);
}

export function isQuitKey(press: KeyPress): boolean {
  return press.ctrl === true && press.name === "c";
}
