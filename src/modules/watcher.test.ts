import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtemp, realpath, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "path";
import type { ChangeEvent } from "../types";
import { DirectoryWatcher, shouldReload } from "./watcher";

describe("shouldReload", () => {
  it.each([
    [{ path: "/notes/a.md", op: "write" }, true],
    [{ path: "/notes/a.md", op: "create" }, true],
    [{ path: "/notes/a.md", op: "remove" }, false],
    [{ path: "/notes/b.md", op: "write" }, false],
  ] satisfies Array<[ChangeEvent, boolean]>)("%j -> %s", (event, expected) => {
    expect(shouldReload(event, "/notes/a.md")).toBe(expected);
  });
});

describe("DirectoryWatcher", () => {
  const watcher = new DirectoryWatcher();
  let dir = "";

  afterEach(async () => {
    watcher.stop();
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("tracks the watched directory", async () => {
    dir = await realpath(await mkdtemp(join(tmpdir(), "mdnav-watch-")));

    watcher.start(dir, () => {});
    expect(watcher.directory).toBe(dir);

    watcher.stop();
    expect(watcher.directory).toBe("");
  });

  it("reports writes to files in the directory", async () => {
    dir = await realpath(await mkdtemp(join(tmpdir(), "mdnav-watch-")));
    const file = join(dir, "note.md");
    const events: ChangeEvent[] = [];

    watcher.start(dir, (event) => events.push(event));
    await writeFile(file, "# Note\n");

    await vi.waitFor(
      () => {
        expect(events.some((event) => shouldReload(event, file))).toBe(true);
      },
      { timeout: 3000 },
    );
  });

  it("delivers nothing after stop", async () => {
    dir = await realpath(await mkdtemp(join(tmpdir(), "mdnav-watch-")));
    const events: ChangeEvent[] = [];

    watcher.start(dir, (event) => events.push(event));
    watcher.stop();
    await writeFile(join(dir, "late.md"), "# Late\n");
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(events).toEqual([]);
  });
});
