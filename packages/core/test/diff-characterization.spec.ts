import { listFixtures, readFixture } from "@ghostdiff/test-corpus";
import { describe, expect, test } from "vitest";
import {
  compareDocuments,
  countDifferences,
  listDifferenceIndices,
} from "../src/diff.js";

describe("diff characterization", () => {
  test("every fixture compared with itself has no differences", () => {
    for (const fixture of listFixtures()) {
      const { original, ghost } = readFixture(fixture.id);
      expect(countDifferences(compareDocuments(original, original))).toBe(0);
      expect(countDifferences(compareDocuments(ghost, ghost))).toBe(0);
    }
  });

  test("json value changes stay modifications under their keys", () => {
    const { original, ghost } = readFixture("json-value-change");
    const result = compareDocuments(original, ghost);
    expect(result.lines.map((line) => line.type)).toEqual([
      "match",
      "match",
      "match",
      "modified",
      "modified",
      "match",
      "match",
      "match",
    ]);
    expect(result.lines[3]?.ghostText).toBe('  "port": 9090,');
    expect(result.lines[4]?.ghostText).toBe('  "debug": true,');
    expect(result.sections).toEqual([
      {
        id: 0,
        start: 0,
        end: 2,
        lineCount: 3,
        preview: '{ "name": "billing-service",',
      },
      {
        id: 5,
        start: 5,
        end: 7,
        lineCount: 3,
        preview: '"owner": "platform" }',
      },
    ]);
  });

  test("yaml key swap cancels and the appended item remains", () => {
    const { original, ghost } = readFixture("yaml-reorder");
    const result = compareDocuments(original, ghost);
    expect(result.lines.map((line) => line.type)).toEqual([
      "match",
      "match",
      "match",
      "match",
      "match",
      "onlyInGhost",
      "match",
    ]);
    expect(result.lines[0]).toMatchObject({
      originalIndex: 0,
      ghostIndex: 1,
      originalText: "service: billing",
    });
    expect(listDifferenceIndices(result)).toEqual([5]);
    expect(result.lines[5]).toEqual({
      type: "onlyInGhost",
      ghostIndex: 6,
      ghostText: "  - FEATURE_FLAGS=on",
    });
    expect(result.sections).toEqual([
      {
        id: 0,
        start: 0,
        end: 4,
        lineCount: 5,
        preview: "service: billing image: billing:1.4.0",
      },
    ]);
  });
});
