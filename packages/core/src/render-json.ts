import { Schema } from "effect";
import type { DiffResult } from "./diff.js";
import { countDifferences, listDifferenceIndices } from "./diff.js";
import type { DiffReport } from "./diff-schema.js";
import { DiffReportSchema } from "./diff-schema.js";

const DiffReportJson = Schema.parseJson(DiffReportSchema, { space: 2 });

export function toDiffReport(result: DiffResult): DiffReport {
  return {
    version: "0.1.0",
    lines: result.lines,
    sections: result.sections,
    summary: {
      differenceCount: countDifferences(result),
      differenceIndices: listDifferenceIndices(result),
    },
  };
}

export function renderJson(result: DiffResult) {
  return Schema.encodeSync(DiffReportJson)(toDiffReport(result));
}
