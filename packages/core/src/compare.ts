import { Effect } from "effect";
import type { ComparisonOptions, DiffResult } from "./diff.js";
import { compareDocuments, countDifferences } from "./diff.js";
import { splitLines } from "./diff-lines.js";
import { Telemetry } from "./telemetry.js";

export function compareDocumentsTraced(
  original: string,
  ghost: string,
  options: ComparisonOptions = {}
): Effect.Effect<DiffResult, never, Telemetry> {
  return Effect.gen(function* () {
    const telemetry = yield* Telemetry;
    const originalLines = splitLines(original).length;
    const ghostLines = splitLines(ghost).length;
    const result = yield* telemetry.span(
      "compare",
      { originalLines, ghostLines },
      Effect.sync(() => compareDocuments(original, ghost, options))
    );
    const differenceCount = countDifferences(result);
    yield* telemetry.metric("ghostdiff.compare.differences", differenceCount);
    yield* telemetry.metric(
      "ghostdiff.compare.sections",
      result.sections.length
    );
    yield* telemetry.log("compare_complete", {
      originalLines,
      ghostLines,
      outputLines: result.lines.length,
      differenceCount,
      sectionCount: result.sections.length,
    });
    return result;
  });
}
