import { describe, expect, test } from "vitest";
import { compareDocuments } from "../src/diff.js";
import { onlyInOriginal } from "../src/diff-line.js";
import {
  differenceLineAt,
  expandAllSections,
  jumpTargetFor,
  nextDifference,
  previousDifference,
  sectionContaining,
  toggleSection,
} from "../src/diff-navigation.js";

const original = "a: 1\nb: 2\nc: 3\nd: 4\ne: 5\nf: 6";
const ghost = "a: 1\nb: 9\nc: 3\nd: 4\ne: 5\nf: 0";

describe("difference navigation", () => {
  const result = compareDocuments(original, ghost);

  test("fixture has differences at positions 1 and 5", () => {
    expect(result.lines.map((line) => line.type)).toEqual([
      "match",
      "modified",
      "match",
      "match",
      "match",
      "modified",
    ]);
  });

  test("moves cyclically through differences", () => {
    expect(nextDifference(result, 0)).toBe(1);
    expect(nextDifference(result, 1)).toBe(0);
    expect(previousDifference(result, 0)).toBe(1);
    expect(previousDifference(result, 1)).toBe(0);
  });

  test("stays at zero without differences", () => {
    const same = compareDocuments(original, original);
    expect(nextDifference(same, 0)).toBe(0);
    expect(previousDifference(same, 0)).toBe(0);
    expect(differenceLineAt(same, 0)).toBeUndefined();
  });

  test("resolves the line behind a cursor", () => {
    expect(differenceLineAt(result, 1)?.ghostText).toBe("f: 0");
    expect(differenceLineAt(result, 2)).toBeUndefined();
  });

  test("jump targets use the ghost side", () => {
    const line = result.lines[1];
    expect(line && jumpTargetFor(line)).toEqual({ ghostLine: 1 });
    expect(
      jumpTargetFor(onlyInOriginal({ index: 3, text: "gone" }))
    ).toBeNull();
  });

  test("finds the section covering a position", () => {
    expect(sectionContaining(result, 3)?.id).toBe(2);
    expect(sectionContaining(result, 1)).toBeUndefined();
  });

  test("section expansion is tracked outside the result", () => {
    const initial = new Set<number>();
    const expanded = toggleSection(initial, 2);
    expect([...expanded]).toEqual([2]);
    expect(initial.size).toBe(0);
    expect([...toggleSection(expanded, 2)]).toEqual([]);
    expect([...expandAllSections(result)]).toEqual([2]);
  });
});
