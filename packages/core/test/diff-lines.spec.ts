import { describe, expect, test } from "vitest";
import { splitLines, trimLine } from "../src/diff-lines.js";

describe("splitLines", () => {
  test("CRLF is a single boundary", () => {
    expect(splitLines("a\r\nb\rc\nd")).toEqual(["a", "b", "c", "d"]);
  });

  test("unicode and control line separators end lines", () => {
    expect(splitLines("a\u2028b\u0085c")).toEqual(["a", "b", "c"]);
    expect(splitLines("a\u2029b\vc\fd")).toEqual(["a", "b", "c", "d"]);
  });

  test("empty text is one empty line and a trailing newline adds one", () => {
    expect(splitLines("")).toEqual([""]);
    expect(splitLines("a\n")).toEqual(["a", ""]);
    expect(splitLines("\r\n\r\n")).toEqual(["", "", ""]);
  });
});

describe("trimLine", () => {
  test("strips surrounding whitespace only", () => {
    expect(trimLine("  a b\t")).toBe("a b");
  });
});
