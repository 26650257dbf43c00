import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { HELP_HEIGHT, helpView, pagerView, statusBarView } from "./pager-view";
import { PagerModel } from "./pager";
import { LinkRegistry } from "./registry";

const plain = new Chalk({ level: 0 });

function loadedModel(width: number, height: number): PagerModel {
  const model = new PagerModel({
    statusMessageTimeout: 3000,
    watch: false,
    helpHeight: HELP_HEIGHT,
  });
  model.setSize(width, height);
  model.update({
    type: "documentLoaded",
    requestId: 0,
    document: { localPath: "/notes/index.md", note: "index.md", body: "" },
    links: LinkRegistry.empty(),
  });
  model.update({ type: "contentRendered", content: "first line\nsecond" });
  return model;
}

describe("statusBarView", () => {
  it("shows the note and fills the width", () => {
    const model = loadedModel(40, 5);
    const bar = statusBarView(model, plain);

    expect(bar).toBe(
      " mdnav " + " index.md " + " ".repeat(9) + " 100% " + " ? Help ",
    );
    expect(bar.length).toBe(40);
  });

  it("shows the status message instead of the note", () => {
    const model = loadedModel(60, 5);
    model.update({ type: "key", key: "tab" });

    expect(statusBarView(model, plain)).toContain(" No followable links ");
  });

  it("truncates long text with an ellipsis", () => {
    const model = loadedModel(30, 5);
    model.update({ type: "key", key: "tab" });

    // 30 - 7 (logo) - 6 (percent) - 8 (help) leaves 9 columns
    expect(statusBarView(model, plain)).toBe(
      " mdnav " + " No foll…" + " 100% " + " ? Help ",
    );
  });
});

describe("pagerView", () => {
  it("draws visible lines cut to the width and the status bar", () => {
    const model = loadedModel(8, 3);
    const lines = pagerView(model, plain).split("\n");

    expect(lines.slice(0, 2)).toEqual(["first li\x1b[0m", "second"]);
    expect(lines).toHaveLength(3);
  });

  it("appends the help view while help is shown", () => {
    const model = loadedModel(60, 20);
    model.update({ type: "key", key: "help" });

    const lines = pagerView(model, plain).split("\n");

    expect(lines).toHaveLength(model.viewport.height + 1 + HELP_HEIGHT);
    expect(lines.slice(-HELP_HEIGHT)).toEqual(
      helpView(60, plain).split("\n"),
    );
  });
});
