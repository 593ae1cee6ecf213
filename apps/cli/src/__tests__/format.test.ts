import { NoActiveBlockError, SourceDocument } from "@replkit/source";
import pc from "picocolors";
import { describe, expect, it } from "vitest";
import {
  blockToJson,
  formatBlockHeader,
  formatError,
  formatOutcome,
  formatStep,
} from "../format.js";

const plain = pc.createColors(false);

const block = {
  kind: "defun" as const,
  start: 0,
  end: 24,
  range: { startLine: 1, endLine: 2 },
};

describe("formatBlockHeader", () => {
  it("names the kind and line range", () => {
    expect(formatBlockHeader(block, "app.py", plain)).toBe("defun app.py:1-2");
  });
});

describe("blockToJson", () => {
  it("includes offsets, lines and text", () => {
    expect(JSON.parse(blockToJson(block, "def f():\n    return 1\n"))).toEqual({
      kind: "defun",
      start: 0,
      end: 24,
      startLine: 1,
      endLine: 2,
      text: "def f():\n    return 1\n",
    });
  });
});

describe("formatOutcome", () => {
  it("prints captured output as is", () => {
    expect(formatOutcome({ kind: "output", message: "3", text: "3\n" }, 1000, plain)).toBe("3");
  });

  it("follows an exception notice with the traceback", () => {
    const text = "Traceback (most recent call last):\nValueError: bad\n";
    expect(
      formatOutcome(
        { kind: "exception", message: "Exception occurred (see the session transcript)", text },
        1000,
        plain,
      ),
    ).toBe(
      "Exception occurred (see the session transcript)\nTraceback (most recent call last):\nValueError: bad",
    );
  });

  it("reports empty output, uncaptured sends and timeouts", () => {
    expect(
      formatOutcome({ kind: "empty", message: "No output was produced.", text: "" }, 1000, plain),
    ).toBe("No output was produced.");
    expect(formatOutcome(null, 1000, plain)).toBe("Sent (output not captured).");
    expect(formatOutcome("timeout", 250, plain)).toBe(
      "No prompt after 250 ms; the interpreter may still be running.",
    );
  });
});

describe("formatStep", () => {
  const doc = new SourceDocument("x = 1\ny = 2\n");

  it("names the next statement line", () => {
    expect(formatStep(doc, 6)).toBe("Next statement at line 2");
  });

  it("reports the end of the file", () => {
    expect(formatStep(doc, doc.text.length)).toBe("End of file reached.");
  });
});

describe("formatError", () => {
  it("treats a missing block as a notice", () => {
    const error = new NoActiveBlockError({ message: "Not inside a function definition" });
    expect(formatError(error, plain)).toEqual({
      text: "Not inside a function definition",
      exitCode: 0,
    });
  });

  it("reports other failures with exit code 1", () => {
    expect(formatError({ _tag: "ConfigurationError", message: "bad config" }, plain)).toEqual({
      text: "Error: bad config",
      exitCode: 1,
    });
  });
});
