import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { SourceDocument } from "@replkit/source";
import { InvalidArgumentError } from "commander";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  cursorOffset,
  loadDocument,
  parseOffset,
  parsePositiveInt,
  regionEnd,
} from "../loader.js";

describe("parsePositiveInt", () => {
  it("parses whole numbers", () => {
    expect(parsePositiveInt("12")).toBe(12);
  });

  it("rejects zero and junk", () => {
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("3x")).toThrow("Expected a positive integer.");
  });
});

describe("parseOffset", () => {
  it("accepts zero", () => {
    expect(parseOffset("0")).toBe(0);
    expect(() => parseOffset("-1")).toThrow("Expected a non-negative integer.");
  });
});

describe("cursorOffset", () => {
  const doc = new SourceDocument("x = 1\ny = 2\n");

  it("starts at the top by default", () => {
    expect(cursorOffset(doc, {})).toBe(0);
  });

  it("maps a 1-based line to its start", () => {
    expect(cursorOffset(doc, { line: 2 })).toBe(6);
  });

  it("prefers an explicit offset and clamps it", () => {
    expect(cursorOffset(doc, { line: 2, offset: 3 })).toBe(3);
    expect(cursorOffset(doc, { offset: 500 })).toBe(12);
  });
});

describe("regionEnd", () => {
  const doc = new SourceDocument("x = 1\ny = 2\nz = 3\n");

  it("ends after the --to line", () => {
    expect(regionEnd(doc, { to: 2 })).toBe(12);
    expect(regionEnd(doc, {})).toBeUndefined();
  });
});

describe("loadDocument", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "replkit-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the file into a document", async () => {
    const file = path.join(dir, "a.py");
    await writeFile(file, "print(1)\n", "utf-8");

    const doc = await Effect.runPromise(loadDocument(file));
    expect(doc.text).toBe("print(1)\n");
  });

  it("fails for a missing file", async () => {
    const error = await Effect.runPromise(Effect.flip(loadDocument(path.join(dir, "none.py"))));
    expect(error._tag).toBe("SourceReadError");
  });
});
