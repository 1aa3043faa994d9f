import { describe, expect, test } from "vitest";
import {
  DEFAULT_LOOKAHEAD_WINDOW,
  findLookaheadMatch,
} from "../src/diff-lookahead.js";

describe("lookahead matcher", () => {
  test("matches trimmed candidates and reports the offset", () => {
    expect(findLookaheadMatch("b", ["a", "  b ", "c"], 0)).toBe(1);
  });

  test("offsets are relative to the starting position", () => {
    expect(findLookaheadMatch("a", ["a", "b", "a"], 1)).toBe(1);
  });

  test("stops at the window bound", () => {
    const lines = ["x", "x", "x", "x", "x", "t"];
    expect(DEFAULT_LOOKAHEAD_WINDOW).toBe(5);
    expect(findLookaheadMatch("t", lines, 0)).toBeNull();
    expect(findLookaheadMatch("t", lines, 0, 6)).toBe(5);
    expect(findLookaheadMatch("t", lines, 1)).toBe(4);
  });

  test("handles exhausted input and empty windows", () => {
    expect(findLookaheadMatch("a", ["a"], 1)).toBeNull();
    expect(findLookaheadMatch("a", ["a"], 5)).toBeNull();
    expect(findLookaheadMatch("a", ["a"], 0, 0)).toBeNull();
  });
});
