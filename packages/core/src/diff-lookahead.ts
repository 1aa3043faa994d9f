import { trimLine } from "./diff-lines.js";

export const DEFAULT_LOOKAHEAD_WINDOW = 5;

/**
 * Offset from `from` of the first line within the window whose trimmed text
 * equals `target`, or null.
 */
export function findLookaheadMatch(
  target: string,
  lines: readonly string[],
  from: number,
  window: number = DEFAULT_LOOKAHEAD_WINDOW
): number | null {
  const available = Math.max(lines.length - from, 0);
  const searchRange = Math.min(window, available);
  for (let offset = 0; offset < searchRange; offset += 1) {
    const candidate = lines[from + offset];
    if (candidate !== undefined && trimLine(candidate) === target) {
      return offset;
    }
  }
  return null;
}
