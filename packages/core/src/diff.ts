import { alignLines } from "./diff-align.js";
import type { CollapsedSection } from "./diff-collapse.js";
import { collapseMatches } from "./diff-collapse.js";
import { filterFalsePositives } from "./diff-filter.js";
import type { DiffLine } from "./diff-line.js";
import { isDifference } from "./diff-line.js";
import { splitLines } from "./diff-lines.js";

export type { CollapsedSection } from "./diff-collapse.js";
export type {
  DiffLine,
  DiffLineType,
  MatchLine,
  ModifiedLine,
  OnlyInGhostLine,
  OnlyInOriginalLine,
} from "./diff-line.js";

export interface DiffResult {
  readonly lines: readonly DiffLine[];
  readonly sections: readonly CollapsedSection[];
}

export interface ComparisonOptions {
  lookaheadWindow?: number | undefined;
  collapseThreshold?: number | undefined;
  previewLength?: number | undefined;
}

/**
 * Aligns `ghost` against `original` line by line.
 *
 * Total over all inputs. An empty text counts as a single empty line, so
 * `compareDocuments("", "x")` yields one modified line rather than an
 * insertion.
 */
export function compareDocuments(
  original: string,
  ghost: string,
  options: ComparisonOptions = {}
): DiffResult {
  const aligned = alignLines(splitLines(original), splitLines(ghost), {
    lookaheadWindow: options.lookaheadWindow,
  });
  const lines = filterFalsePositives(aligned);
  const sections = collapseMatches(lines, {
    collapseThreshold: options.collapseThreshold,
    previewLength: options.previewLength,
  });
  return { lines, sections };
}

/** Number of lines that are not matches. */
export function countDifferences(result: DiffResult) {
  let count = 0;
  for (const line of result.lines) {
    if (isDifference(line)) {
      count += 1;
    }
  }
  return count;
}

/** Positions of the non-match lines, in order. */
export function listDifferenceIndices(result: DiffResult) {
  const indices: number[] = [];
  result.lines.forEach((line, index) => {
    if (isDifference(line)) {
      indices.push(index);
    }
  });
  return indices;
}
