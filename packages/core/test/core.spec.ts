import { describe, expect, test } from "vitest";
import {
  compareDocuments,
  countDifferences,
  listDifferenceIndices,
} from "../src/diff.js";

describe("compareDocuments", () => {
  test("identical text has no differences", () => {
    const text = '{\n  "a": 1,\n  "b": [1, 2]\n}';
    const result = compareDocuments(text, text);
    expect(result.lines).toHaveLength(4);
    expect(result.lines.every((line) => line.type === "match")).toBe(true);
    expect(countDifferences(result)).toBe(0);
    expect(listDifferenceIndices(result)).toEqual([]);
    expect(result.sections).toEqual([
      {
        id: 0,
        start: 0,
        end: 3,
        lineCount: 4,
        preview: '{ "a": 1,',
      },
    ]);
  });

  test("transposed lines cancel out", () => {
    const result = compareDocuments("a\nb\nc", "b\na\nc");
    expect(countDifferences(result)).toBe(0);
    expect(result.lines.map((line) => line.type)).toEqual(["match", "match"]);
    expect(result.lines.map((line) => line.originalText)).toEqual(["a", "c"]);
    expect(result.sections).toEqual([]);
  });

  test("same key with another value is one modification", () => {
    const result = compareDocuments(
      '"a": 1\n"b": 2\n"c": 3',
      '"a": 1\n"b": 5\n"c": 3'
    );
    expect(result.lines.map((line) => line.type)).toEqual([
      "match",
      "modified",
      "match",
    ]);
    expect(result.lines[1]).toEqual({
      type: "modified",
      originalIndex: 1,
      ghostIndex: 1,
      originalText: '"b": 2',
      ghostText: '"b": 5',
    });
    expect(countDifferences(result)).toBe(1);
    expect(listDifferenceIndices(result)).toEqual([1]);
    expect(result.sections).toEqual([]);
  });

  test("an empty original is a single empty line", () => {
    const result = compareDocuments("", "x\ny\nz");
    expect(result.lines).toEqual([
      {
        type: "modified",
        originalIndex: 0,
        ghostIndex: 0,
        originalText: "",
        ghostText: "x",
      },
      { type: "onlyInGhost", ghostIndex: 1, ghostText: "y" },
      { type: "onlyInGhost", ghostIndex: 2, ghostText: "z" },
    ]);
    expect(listDifferenceIndices(result)).toEqual([0, 1, 2]);
  });

  test("an empty ghost mirrors the empty original case", () => {
    const result = compareDocuments("x\ny", "");
    expect(result.lines).toEqual([
      {
        type: "modified",
        originalIndex: 0,
        ghostIndex: 0,
        originalText: "x",
        ghostText: "",
      },
      { type: "onlyInOriginal", originalIndex: 1, originalText: "y" },
    ]);
  });

  test("two empty texts match", () => {
    const result = compareDocuments("", "");
    expect(result.lines.map((line) => line.type)).toEqual(["match"]);
    expect(countDifferences(result)).toBe(0);
  });

  test("line endings are normalized", () => {
    const result = compareDocuments("a\r\nb\rc", "a\nb\nc");
    expect(countDifferences(result)).toBe(0);
    expect(result.lines).toHaveLength(3);
  });

  test("a trailing newline is a real empty line", () => {
    const result = compareDocuments("a\n", "a");
    expect(result.lines.map((line) => line.type)).toEqual([
      "match",
      "onlyInOriginal",
    ]);
    expect(listDifferenceIndices(result)).toEqual([1]);
  });

  test("options reach the collapser", () => {
    const result = compareDocuments("a\nb\nc", "b\na\nc", {
      collapseThreshold: 2,
      previewLength: 1,
    });
    expect(result.sections).toEqual([
      { id: 0, start: 0, end: 1, lineCount: 2, preview: "a…" },
    ]);
  });

  test("output indices stay strictly increasing after filtering", () => {
    const result = compareDocuments(
      "k1: 1\nk2: 2\nk3: 3\nk4: 4\nk5: 5\nk6: 6\nk7: 7",
      "k7: 7\nk2: 2\nk1: 1\nk4: 9\nk3: 3\nk6: 6"
    );
    const originalIndices = result.lines.flatMap((line) =>
      line.originalIndex === undefined ? [] : [line.originalIndex]
    );
    const ghostIndices = result.lines.flatMap((line) =>
      line.ghostIndex === undefined ? [] : [line.ghostIndex]
    );
    for (let i = 1; i < originalIndices.length; i += 1) {
      expect(originalIndices[i]).toBeGreaterThan(originalIndices[i - 1] ?? -1);
    }
    for (let i = 1; i < ghostIndices.length; i += 1) {
      expect(ghostIndices[i]).toBeGreaterThan(ghostIndices[i - 1] ?? -1);
    }
  });
});
