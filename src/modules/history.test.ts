import { describe, it, expect } from "vitest";
import { NavigationHistory } from "./history";

describe("NavigationHistory", () => {
  it("pops entries in reverse order", () => {
    const history = new NavigationHistory();
    history.push({ path: "/notes/a.md", yOffset: 0 });
    history.push({ path: "/notes/b.md", yOffset: 12 });

    expect(history.size).toBe(2);
    expect(history.peek()).toEqual({ path: "/notes/b.md", yOffset: 12 });
    expect(history.pop()).toEqual({ path: "/notes/b.md", yOffset: 12 });
    expect(history.pop()).toEqual({ path: "/notes/a.md", yOffset: 0 });
    expect(history.pop()).toBeUndefined();
    expect(history.isEmpty).toBe(true);
  });

  it("stores a copy of each entry", () => {
    const history = new NavigationHistory();
    const entry = { path: "/notes/a.md", yOffset: 3 };
    history.push(entry);
    entry.yOffset = 40;

    expect(history.peek()).toEqual({ path: "/notes/a.md", yOffset: 3 });
  });

  it("clear() empties the stack", () => {
    const history = new NavigationHistory();
    history.push({ path: "/notes/a.md", yOffset: 0 });
    history.clear();

    expect(history.isEmpty).toBe(true);
    expect(history.peek()).toBeUndefined();
  });
});
