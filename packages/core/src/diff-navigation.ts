import type { CollapsedSection, DiffLine, DiffResult } from "./diff.js";
import { listDifferenceIndices } from "./diff.js";

export interface JumpTarget {
  /** Zero-based line in the ghost document. */
  ghostLine: number;
}

function wrap(cursor: number, length: number) {
  return ((cursor % length) + length) % length;
}

export function nextDifference(result: DiffResult, cursor: number) {
  const count = listDifferenceIndices(result).length;
  if (count === 0) {
    return 0;
  }
  return wrap(cursor + 1, count);
}

export function previousDifference(result: DiffResult, cursor: number) {
  const count = listDifferenceIndices(result).length;
  if (count === 0) {
    return 0;
  }
  return wrap(cursor - 1, count);
}

export function differenceLineAt(
  result: DiffResult,
  cursor: number
): DiffLine | undefined {
  const position = listDifferenceIndices(result)[cursor];
  return position === undefined ? undefined : result.lines[position];
}

export function jumpTargetFor(line: DiffLine): JumpTarget | null {
  if (line.ghostIndex === undefined) {
    return null;
  }
  return { ghostLine: line.ghostIndex };
}

export function sectionContaining(
  result: DiffResult,
  position: number
): CollapsedSection | undefined {
  return result.sections.find(
    (section) => section.start <= position && position <= section.end
  );
}

export function toggleSection(
  expanded: ReadonlySet<number>,
  sectionId: number
): ReadonlySet<number> {
  const next = new Set(expanded);
  if (next.has(sectionId)) {
    next.delete(sectionId);
  } else {
    next.add(sectionId);
  }
  return next;
}

export function expandAllSections(result: DiffResult): ReadonlySet<number> {
  return new Set(result.sections.map((section) => section.id));
}
