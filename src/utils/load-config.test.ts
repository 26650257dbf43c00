import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "path";
import { ZodError } from "zod";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config).toEqual({
      pager: {
        root: ".",
        watch: true,
        showLineNumbers: false,
        statusMessageTimeout: 3000,
      },
      logging: { level: "info", file: true },
    });
  });
});

describe("mergeConfig", () => {
  it("overrides nested keys one at a time", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      pager: { root: "/notes" },
      logging: { level: "debug" },
    });
    expect(merged.pager).toEqual({ ...base.pager, root: "/notes" });
    expect(merged.logging).toEqual({ level: "debug", file: true });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "mdnav-config-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ pager: { watch: false } }));

    const { config, errors } = await loadConfig(custom);

    expect(config.pager.watch).toBe(false);
    expect(errors.filter((e) => e.path === custom)).toEqual([]);
  });

  it("reports an invalid custom config and keeps the other layers", async () => {
    const custom = join(dir, "invalid.json");
    await writeFile(custom, JSON.stringify({ pager: { watch: "yes" } }));

    const { config, errors } = await loadConfig(custom);
    const reported = errors.find((e) => e.path === custom);

    expect(reported?.error).toBeInstanceOf(ZodError);
    expect(typeof config.pager.watch).toBe("boolean");
  });

  it("reports malformed JSON", async () => {
    const custom = join(dir, "broken.json");
    await writeFile(custom, "{ not json");

    const { errors } = await loadConfig(custom);
    const reported = errors.find((e) => e.path === custom);

    expect(reported?.error).toBeInstanceOf(SyntaxError);
  });
});
