import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InterpreterLauncher } from "../interpreter-process.js";

const resolveWith = (interpreter: string) =>
  Effect.runPromise(
    Effect.flatMap(InterpreterLauncher, (launcher) => launcher.resolve(interpreter)).pipe(
      Effect.flip,
      Effect.provide(InterpreterLauncher.Default),
    ),
  );

describe("InterpreterLauncher.resolve", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "replkit-launcher-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("rejects names carrying shell syntax without running them", async () => {
    const error = await resolveWith("python3;echo hi");

    expect(error._tag).toBe("ConfigurationError");
    expect(error.message).toBe('Interpreter "python3;echo hi" is not a command name or path');
  });

  it("reports a command missing from PATH", async () => {
    const error = await resolveWith("replkit-no-such-interpreter");

    expect(error.message).toBe('Interpreter "replkit-no-such-interpreter" not found in PATH');
  });

  it("rejects a path that is not executable", async () => {
    const file = path.join(dir, "python");
    await writeFile(file, "", "utf-8");

    const error = await resolveWith(file);

    expect(error.message).toBe(`Interpreter is not executable: ${file}`);
  });
});
