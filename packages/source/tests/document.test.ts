import { describe, expect, it } from "vitest";
import { SourceDocument } from "../src/document.js";

describe("SourceDocument", () => {
  describe("lines", () => {
    it("drops the empty line after a final newline", () => {
      const doc = new SourceDocument("a\nb\n");
      expect(doc.lines).toEqual(["a", "b"]);
    });

    it("has no lines for empty text", () => {
      expect(new SourceDocument("").lineCount).toBe(0);
    });

    it("maps offsets to lines", () => {
      const doc = new SourceDocument("ab\ncd\n");
      expect(doc.lineAt(0)).toBe(0);
      expect(doc.lineAt(2)).toBe(0);
      expect(doc.lineAt(3)).toBe(1);
      expect(doc.lineAt(6)).toBe(1);
      expect(doc.lineAt(100)).toBe(1);
    });

    it("reports line offsets including the newline", () => {
      const doc = new SourceDocument("ab\ncd\n");
      expect(doc.lineStart(1)).toBe(3);
      expect(doc.lineEnd(0)).toBe(3);
      expect(doc.lineEnd(1)).toBe(6);
    });
  });

  describe("continuations", () => {
    const doc = new SourceDocument(
      [
        "x = foo(1,",
        "        2)",
        'y = """doc',
        "# not a comment",
        '"""',
        "z = 1 + \\",
        "    2",
        "s = 'a\\'b' # (",
        "w = 3",
      ].join("\n"),
    );

    it("marks lines inside brackets", () => {
      expect(doc.isContinuation(0)).toBe(false);
      expect(doc.isContinuation(1)).toBe(true);
    });

    it("marks lines inside triple-quoted strings", () => {
      expect(doc.isContinuation(2)).toBe(false);
      expect(doc.isContinuation(3)).toBe(true);
      expect(doc.isContinuation(4)).toBe(true);
    });

    it("treats comment-like lines inside strings as statement lines", () => {
      expect(doc.kind(3)).toBe("comment");
      expect(doc.isStatementLine(3)).toBe(true);
    });

    it("marks lines after a backslash", () => {
      expect(doc.isContinuation(5)).toBe(false);
      expect(doc.isContinuation(6)).toBe(true);
    });

    it("ignores escaped quotes and brackets in comments", () => {
      expect(doc.isContinuation(7)).toBe(false);
      expect(doc.isContinuation(8)).toBe(false);
    });
  });
});
