import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export const packageName = "@ghostdiff/test-corpus";

export interface Fixture {
  id: string;
  format: "json" | "yaml";
  description: string;
  originalPath: string;
  ghostPath: string;
}

export interface FixtureTexts {
  original: string;
  ghost: string;
}

const baseUrl = new URL("../fixtures/", import.meta.url);

function resolveFixture(path: string) {
  return fileURLToPath(new URL(path, baseUrl));
}

const fixtures: Fixture[] = [
  {
    id: "json-value-change",
    format: "json",
    description: "Two values change under unchanged keys.",
    originalPath: resolveFixture("json-value-change/original.json"),
    ghostPath: resolveFixture("json-value-change/ghost.json"),
  },
  {
    id: "yaml-reorder",
    format: "yaml",
    description: "Two keys swap places and a list item is appended.",
    originalPath: resolveFixture("yaml-reorder/original.yaml"),
    ghostPath: resolveFixture("yaml-reorder/ghost.yaml"),
  },
];

export function listFixtures() {
  return fixtures.slice();
}

export function readFixture(id: string): FixtureTexts {
  const fixture = fixtures.find((entry) => entry.id === id);
  if (!fixture) {
    throw new Error(`Unknown fixture: ${id}`);
  }
  return {
    original: readFileSync(fixture.originalPath, "utf8"),
    ghost: readFileSync(fixture.ghostPath, "utf8"),
  };
}
