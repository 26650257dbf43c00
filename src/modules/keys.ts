/**
 * Keys Module
 * Maps readline keypress data to pager keys
 */

import type { KeyName } from "../types";

/** Shape of the key object emitted by readline's "keypress" event */
export interface Keypress {
  name?: string;
  ctrl?: boolean;
  shift?: boolean;
  sequence?: string;
}

const BY_NAME: Record<string, KeyName> = {
  tab: "tab",
  return: "enter",
  enter: "enter",
  backspace: "backspace",
  up: "up",
  down: "down",
  pageup: "pageup",
  pagedown: "pagedown",
  home: "home",
  end: "end",
  escape: "esc",
  space: "pagedown",
};

const BY_CHAR: Record<string, KeyName> = {
  k: "up",
  j: "down",
  b: "pageup",
  f: "pagedown",
  u: "halfpageup",
  d: "halfpagedown",
  g: "home",
  G: "end",
  r: "reload",
  "?": "help",
  q: "quit",
};

/**
 * Translate a keypress, or null when it has no binding
 *
 * @example
 * keyFromKeypress("\t", { name: "tab", shift: true }) // "shift+tab"
 * keyFromKeypress("G", { name: "g", shift: true }) // "end"
 */
export function keyFromKeypress(
  str: string | undefined,
  key: Keypress | undefined,
): KeyName | null {
  if (key?.ctrl && key.name === "c") {
    return "quit";
  }
  if (key?.name === "tab" && key.shift) {
    return "shift+tab";
  }
  if (str !== undefined && str.length === 1 && BY_CHAR[str]) {
    return BY_CHAR[str];
  }
  if (key?.name && BY_NAME[key.name]) {
    return BY_NAME[key.name];
  }
  return null;
}
