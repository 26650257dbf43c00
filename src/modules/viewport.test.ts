import { describe, it, expect } from "vitest";
import { Viewport } from "./viewport";

function lines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i}`).join("\n");
}

describe("Viewport", () => {
  it("shows the first lines and pads to its height", () => {
    const viewport = new Viewport(80, 4);
    viewport.setContent("a\nb");

    expect(viewport.totalLineCount).toBe(2);
    expect(viewport.visibleLines()).toEqual(["a", "b", "", ""]);
    expect(viewport.scrollPercent()).toBe(1);
  });

  it("treats empty content as no lines", () => {
    const viewport = new Viewport(80, 2);
    viewport.setContent("");
    expect(viewport.totalLineCount).toBe(0);
    expect(viewport.visibleLines()).toEqual(["", ""]);
  });

  it("scrolls by lines, pages and half pages within bounds", () => {
    const viewport = new Viewport(80, 4);
    viewport.setContent(lines(10));

    viewport.lineDown();
    expect(viewport.yOffset).toBe(1);
    viewport.pageDown();
    expect(viewport.yOffset).toBe(5);
    viewport.halfPageDown();
    expect(viewport.yOffset).toBe(6);
    expect(viewport.atBottom()).toBe(true);
    viewport.pageDown();
    expect(viewport.yOffset).toBe(6);

    viewport.halfPageUp();
    expect(viewport.yOffset).toBe(4);
    viewport.pageUp();
    expect(viewport.yOffset).toBe(0);
    viewport.lineUp();
    expect(viewport.yOffset).toBe(0);
    expect(viewport.atTop()).toBe(true);
  });

  it("jumps to the top and bottom", () => {
    const viewport = new Viewport(80, 3);
    viewport.setContent(lines(10));

    viewport.gotoBottom();
    expect(viewport.yOffset).toBe(7);
    expect(viewport.visibleLines()).toEqual(["line 7", "line 8", "line 9"]);
    expect(viewport.scrollPercent()).toBe(1);

    viewport.gotoTop();
    expect(viewport.yOffset).toBe(0);
    expect(viewport.scrollPercent()).toBe(0);
  });

  it("clamps setYOffset", () => {
    const viewport = new Viewport(80, 4);
    viewport.setContent(lines(10));

    viewport.setYOffset(100);
    expect(viewport.yOffset).toBe(6);
    viewport.setYOffset(-3);
    expect(viewport.yOffset).toBe(0);
  });

  it("moves back to the bottom when new content is shorter", () => {
    const viewport = new Viewport(80, 4);
    viewport.setContent(lines(10));
    viewport.gotoBottom();

    viewport.setContent(lines(5));

    expect(viewport.yOffset).toBe(1);
    expect(viewport.visibleLines()).toEqual([
      "line 1",
      "line 2",
      "line 3",
      "line 4",
    ]);
  });
});
