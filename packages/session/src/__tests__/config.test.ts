import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CONFIG_FILE_NAME,
  cellPatternsFromConfig,
  defaultConfig,
  loadConfig,
  resolveWorkingDirectory,
} from "../config.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "replkit-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = (value: unknown) =>
    writeFile(path.join(dir, CONFIG_FILE_NAME), JSON.stringify(value), "utf-8");

  it("uses defaults without a config file", async () => {
    const config = await Effect.runPromise(loadConfig(dir, {}));

    expect(config).toEqual(defaultConfig);
    expect(config).toMatchObject({
      interpreter: "python3",
      interpreterArgs: ["-i", "-u"],
      dedicated: false,
      echoInput: true,
      echoOutput: "when-not-visible",
      echoInputHeadLines: 10,
      echoInputTailLines: 10,
      readyTimeoutMs: 3000,
      readyPollIntervalMs: 100,
      workingDirectory: { mode: "current" },
      runMainGuard: false,
    });
  });

  it("reads settings from the config file", async () => {
    await writeConfig({ interpreter: "python3.12", dedicated: true, echoOutput: "always" });
    const config = await Effect.runPromise(loadConfig(dir, {}));

    expect(config.interpreter).toBe("python3.12");
    expect(config.dedicated).toBe(true);
    expect(config.echoOutput).toBe("always");
    expect(config.readyTimeoutMs).toBe(3000);
  });

  it("lets the environment override the file", async () => {
    await writeConfig({ interpreter: "python3.12", dedicated: true });
    const config = await Effect.runPromise(
      loadConfig(dir, { REPLKIT_INTERPRETER: "pypy3", REPLKIT_DEDICATED: "0" }),
    );

    expect(config.interpreter).toBe("pypy3");
    expect(config.dedicated).toBe(false);
  });

  it("rejects an unreadable REPLKIT_DEDICATED", async () => {
    const error = await Effect.runPromise(
      Effect.flip(loadConfig(dir, { REPLKIT_DEDICATED: "yes" })),
    );
    expect(error._tag).toBe("ConfigurationError");
  });

  it("lists schema violations", async () => {
    await writeConfig({ readyTimeoutMs: -1, cellBoundaryPattern: "(" });
    const error = await Effect.runPromise(Effect.flip(loadConfig(dir, {})));

    expect(error.issues).toEqual([
      "readyTimeoutMs: Number must be greater than 0",
      "cellBoundaryPattern: Invalid regular expression",
    ]);
  });

  it("rejects unknown settings", async () => {
    await writeConfig({ bogus: 1 });
    const error = await Effect.runPromise(Effect.flip(loadConfig(dir, {})));

    expect(error.message).toContain("bogus");
  });

  it("rejects malformed JSON", async () => {
    await writeFile(path.join(dir, CONFIG_FILE_NAME), "{ interpreter:", "utf-8");
    const error = await Effect.runPromise(Effect.flip(loadConfig(dir, {})));

    expect(error.message.startsWith("Invalid JSON in")).toBe(true);
  });

  it("rejects a JSON value that is not an object", async () => {
    await writeConfig(["python3"]);
    const error = await Effect.runPromise(Effect.flip(loadConfig(dir, {})));

    expect(error.message).toBe(`${path.join(dir, CONFIG_FILE_NAME)} must contain a JSON object`);
  });
});

describe("resolveWorkingDirectory", () => {
  it("uses the process directory in current mode", () => {
    expect(Effect.runSync(resolveWorkingDirectory({ mode: "current" }, "/a/b.py", "/cwd"))).toBe(
      "/cwd",
    );
  });

  it("uses the source directory in source mode", () => {
    expect(Effect.runSync(resolveWorkingDirectory({ mode: "source" }, "src/b.py", "/cwd"))).toBe(
      "/cwd/src",
    );
    expect(Effect.runSync(resolveWorkingDirectory({ mode: "source" }, undefined, "/cwd"))).toBe(
      "/cwd",
    );
  });

  it("requires a path in fixed mode", () => {
    expect(
      Effect.runSync(resolveWorkingDirectory({ mode: "fixed", path: "/srv" }, undefined, "/cwd")),
    ).toBe("/srv");

    const error = Effect.runSync(Effect.flip(resolveWorkingDirectory({ mode: "fixed" })));
    expect(error.message).toBe('Working directory mode "fixed" needs a path');
  });
});

describe("cellPatternsFromConfig", () => {
  it("compiles the default cell markers", () => {
    const patterns = cellPatternsFromConfig(defaultConfig);

    expect(patterns.boundary.test("# In[3]:")).toBe(true);
    expect(patterns.beginning.test("# <markdowncell>")).toBe(false);
    expect(patterns.boundary.test("# <markdowncell>")).toBe(true);
  });
});
