import { describe, it, expect } from "vitest";
import { keyFromKeypress } from "./keys";

describe("keyFromKeypress", () => {
  it.each([
    ["j", { name: "j" }, "down"],
    ["k", { name: "k" }, "up"],
    ["G", { name: "g", shift: true }, "end"],
    ["g", { name: "g" }, "home"],
    ["?", undefined, "help"],
    ["q", { name: "q" }, "quit"],
    ["r", { name: "r" }, "reload"],
    ["\t", { name: "tab" }, "tab"],
    ["\r", { name: "return" }, "enter"],
    [" ", { name: "space" }, "pagedown"],
    [undefined, { name: "up" }, "up"],
    [undefined, { name: "pagedown" }, "pagedown"],
    [undefined, { name: "escape" }, "esc"],
    [undefined, { name: "backspace" }, "backspace"],
  ] as const)("%j %j -> %s", (str, key, expected) => {
    expect(keyFromKeypress(str, key)).toBe(expected);
  });

  it("maps shift+tab", () => {
    expect(keyFromKeypress(undefined, { name: "tab", shift: true })).toBe(
      "shift+tab",
    );
  });

  it("maps ctrl+c to quit", () => {
    expect(keyFromKeypress("\x03", { name: "c", ctrl: true })).toBe("quit");
  });

  it("returns null for unbound keys", () => {
    expect(keyFromKeypress("x", { name: "x" })).toBeNull();
    expect(keyFromKeypress(undefined, undefined)).toBeNull();
  });
});
