import { describe, expect, it } from "vitest";
import { classifyLine, indentationOf } from "../src/line-classifier.js";

describe("classifyLine", () => {
  it("recognises decorators", () => {
    expect(classifyLine("@property")).toBe("decorator");
    expect(classifyLine("    @app.route('/')")).toBe("decorator");
  });

  it("recognises function headers", () => {
    expect(classifyLine("def greet(name):")).toBe("def-header");
    expect(classifyLine("    def __init__(self):")).toBe("def-header");
    expect(classifyLine("async def fetch():")).toBe("def-header");
  });

  it("recognises class headers", () => {
    expect(classifyLine("class Greeter:")).toBe("class-header");
    expect(classifyLine("  class Inner(Base):")).toBe("class-header");
  });

  it("recognises dependent clauses", () => {
    expect(classifyLine("else:")).toBe("else-elif-continuation");
    expect(classifyLine("    elif x > 1:")).toBe("else-elif-continuation");
    expect(classifyLine("except ValueError:")).toBe("else-elif-continuation");
    expect(classifyLine("finally:")).toBe("else-elif-continuation");
  });

  it("does not mistake identifiers that share a keyword prefix", () => {
    expect(classifyLine("elsewhere = 1")).toBe("code");
    expect(classifyLine("definitely = 2")).toBe("code");
    expect(classifyLine("classic = 3")).toBe("code");
    expect(classifyLine("finally_done = True")).toBe("code");
  });

  it("treats whitespace-only lines as blank", () => {
    expect(classifyLine("")).toBe("blank");
    expect(classifyLine("   \t ")).toBe("blank");
  });

  it("recognises comments and plain code", () => {
    expect(classifyLine("# note")).toBe("comment");
    expect(classifyLine("    # indented note")).toBe("comment");
    expect(classifyLine("x = 1")).toBe("code");
    expect(classifyLine("# else: handled below")).toBe("comment");
  });
});

describe("indentationOf", () => {
  it("counts spaces", () => {
    expect(indentationOf("    x")).toBe(4);
    expect(indentationOf("x")).toBe(0);
  });

  it("advances tabs to the next multiple of eight", () => {
    expect(indentationOf("\tx")).toBe(8);
    expect(indentationOf("  \tx")).toBe(8);
    expect(indentationOf("\t  x")).toBe(10);
  });
});
