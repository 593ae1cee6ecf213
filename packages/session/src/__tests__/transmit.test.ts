import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { FILE_LOAD_PREAMBLE } from "@replkit/source";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeFileTransmitter } from "../transmit.js";
import { makeFakeSession } from "./fake-interpreter.js";

describe("makeFileTransmitter", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "replkit-transmit-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("types a single line directly", async () => {
    const { session, fake } = makeFakeSession();
    await Effect.runPromise(makeFileTransmitter({ tempDir })(session, "x = 1\n"));

    expect(fake.written).toEqual(["x = 1\n"]);
    expect(await readdir(tempDir)).toEqual([]);
  });

  it("ends a one-line compound statement with an empty line", async () => {
    const { session, fake } = makeFakeSession();
    await Effect.runPromise(
      makeFileTransmitter({ tempDir })(session, "for i in range(3): print(i)"),
    );

    expect(fake.written).toEqual(["for i in range(3): print(i)\n\n"]);
  });

  it("sends longer text through a payload file", async () => {
    const { session, fake } = makeFakeSession();
    await Effect.runPromise(makeFileTransmitter({ tempDir })(session, "a = 1\nb = 2\n"));

    expect(fake.written).toHaveLength(1);
    const command = fake.written[0] ?? "";
    expect(command.startsWith(FILE_LOAD_PREAMBLE)).toBe(true);
    expect(command.endsWith("\n")).toBe(true);
    expect(command.split("\n")).toHaveLength(2);

    const [file] = await readdir(tempDir);
    const payloadPath = path.join(tempDir, file ?? "");
    expect(command).toContain(`os.remove('''${payloadPath}''')`);
    expect(await readFile(payloadPath, "utf-8")).toBe("a = 1\nb = 2");
  });

  it("reports tracebacks under the display name", async () => {
    const { session, fake } = makeFakeSession();
    await Effect.runPromise(
      makeFileTransmitter({ tempDir, displayName: "notebook.py" })(session, "a = 1\nb = 2"),
    );

    expect(fake.written[0]).toContain("ast.parse(__code, '''notebook.py''')");
  });

  it("removes the payload file when the write fails", async () => {
    const { session, fake } = makeFakeSession();
    fake.failWrites = true;

    const error = await Effect.runPromise(
      Effect.flip(makeFileTransmitter({ tempDir })(session, "a = 1\nb = 2")),
    );

    expect(error._tag).toBe("TransmissionError");
    expect(await readdir(tempDir)).toEqual([]);
  });
});
