import { existsSync, readFileSync } from "node:fs";
import { describe, expect, test } from "vitest";
import { listFixtures, readFixture } from "../src/index.js";

describe("test corpus fixtures", () => {
  test("fixtures resolve to files with content", () => {
    const fixtures = listFixtures();
    expect(fixtures.length).toBeGreaterThan(0);
    for (const fixture of fixtures) {
      expect(existsSync(fixture.originalPath)).toBe(true);
      expect(existsSync(fixture.ghostPath)).toBe(true);
      expect(readFileSync(fixture.originalPath, "utf8").length).toBeGreaterThan(
        0
      );
      expect(readFileSync(fixture.ghostPath, "utf8").length).toBeGreaterThan(0);
    }
  });

  test("readFixture returns both texts", () => {
    const texts = readFixture("yaml-reorder");
    expect(texts.original.startsWith("service: billing\n")).toBe(true);
    expect(texts.ghost.startsWith("replicas: 2\n")).toBe(true);
  });

  test("readFixture rejects unknown ids", () => {
    expect(() => readFixture("missing")).toThrow("Unknown fixture: missing");
  });
});
