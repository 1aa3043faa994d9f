import type { DiffLine } from "./diff-line.js";
import { trimLine } from "./diff-lines.js";

export const DEFAULT_COLLAPSE_THRESHOLD = 3;
export const DEFAULT_PREVIEW_LENGTH = 60;
const PREVIEW_LINES = 2;
const ELLIPSIS = "…";

export interface CollapsedSection {
  /** Stable identity for expanded state; equal to `start`. */
  readonly id: number;
  readonly start: number;
  readonly end: number;
  readonly lineCount: number;
  readonly preview: string;
}

export interface CollapseOptions {
  collapseThreshold?: number | undefined;
  previewLength?: number | undefined;
}

export function buildPreview(
  lines: readonly DiffLine[],
  start: number,
  end: number,
  maxLength: number = DEFAULT_PREVIEW_LENGTH
) {
  const joined = lines
    .slice(start, Math.min(start + PREVIEW_LINES - 1, end) + 1)
    .flatMap((line) =>
      line.originalText === undefined ? [] : [trimLine(line.originalText)]
    )
    .join(" ");
  const characters = Array.from(joined);
  if (characters.length <= maxLength) {
    return joined;
  }
  return `${characters.slice(0, maxLength).join("")}${ELLIPSIS}`;
}

export function collapseMatches(
  lines: readonly DiffLine[],
  options: CollapseOptions = {}
): CollapsedSection[] {
  const threshold = options.collapseThreshold ?? DEFAULT_COLLAPSE_THRESHOLD;
  const previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
  const sections: CollapsedSection[] = [];
  let runStart: number | null = null;

  const close = (endExclusive: number) => {
    if (runStart === null) {
      return;
    }
    const lineCount = endExclusive - runStart;
    if (lineCount >= threshold) {
      const end = endExclusive - 1;
      sections.push({
        id: runStart,
        start: runStart,
        end,
        lineCount,
        preview: buildPreview(lines, runStart, end, previewLength),
      });
    }
    runStart = null;
  };

  lines.forEach((line, index) => {
    if (line.type === "match") {
      if (runStart === null) {
        runStart = index;
      }
    } else {
      close(index);
    }
  });
  close(lines.length);

  return sections;
}

export function describeSection(section: CollapsedSection) {
  return `Lines ${section.start + 1}-${section.end + 1} match (${section.lineCount} lines)`;
}
