import { describe, it, expect } from "vitest";
import {
  isAbsoluteOrUncPath,
  isWithinRoot,
  splitFragment,
  stripAbsolutePath,
  stripAngleBrackets,
} from "./path";

describe("splitFragment", () => {
  it("splits at the first hash", () => {
    expect(splitFragment("docs/a.md#setup#extra")).toEqual({
      path: "docs/a.md",
      fragment: "setup#extra",
    });
  });

  it("returns an empty fragment without a hash", () => {
    expect(splitFragment("docs/a.md")).toEqual({
      path: "docs/a.md",
      fragment: "",
    });
  });

  it("keeps an empty path for fragment-only destinations", () => {
    expect(splitFragment("#top")).toEqual({ path: "", fragment: "top" });
  });
});

describe("stripAngleBrackets", () => {
  it("removes one layer of brackets", () => {
    expect(stripAngleBrackets("<docs/a b.md>")).toBe("docs/a b.md");
    expect(stripAngleBrackets("<<a.md>>")).toBe("<a.md>");
  });

  it("leaves unbalanced brackets alone", () => {
    expect(stripAngleBrackets("<a.md")).toBe("<a.md");
    expect(stripAngleBrackets(">")).toBe(">");
  });
});

describe("isAbsoluteOrUncPath", () => {
  it.each([
    ["/etc/notes.md", true],
    ["\\\\server\\share\\a.md", true],
    ["C:\\docs\\a.md", true],
    ["c:a.md", true],
    ["docs/a.md", false],
    ["./a.md", false],
    ["../a.md", false],
  ])("%s -> %s", (input, expected) => {
    expect(isAbsoluteOrUncPath(input)).toBe(expected);
  });
});

describe("stripAbsolutePath", () => {
  it("removes the root prefix", () => {
    expect(stripAbsolutePath("/notes/docs/a.md", "/notes")).toBe("docs/a.md");
  });

  it("accepts a root with a trailing separator", () => {
    expect(stripAbsolutePath("/notes/a.md", "/notes/")).toBe("a.md");
  });

  it("does not strip a sibling directory with the same prefix", () => {
    expect(stripAbsolutePath("/notes-extra/a.md", "/notes")).toBe(
      "/notes-extra/a.md",
    );
  });
});

describe("isWithinRoot", () => {
  it("accepts the root and its descendants", () => {
    expect(isWithinRoot("/notes", "/notes")).toBe(true);
    expect(isWithinRoot("/notes", "/notes/docs/a.md")).toBe(true);
  });

  it("accepts names that merely start with dots", () => {
    expect(isWithinRoot("/notes", "/notes/..hidden.md")).toBe(true);
  });

  it("rejects parents and siblings", () => {
    expect(isWithinRoot("/notes/docs", "/notes")).toBe(false);
    expect(isWithinRoot("/notes", "/notes-extra/a.md")).toBe(false);
    expect(isWithinRoot("/notes", "/elsewhere/a.md")).toBe(false);
  });
});
