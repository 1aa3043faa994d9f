import type { DiffLine } from "./diff-line.js";
import { trimLine } from "./diff-lines.js";

interface Positioned {
  position: number;
  text: string;
}

/**
 * Drops onlyInOriginal/onlyInGhost pairs whose trimmed text is identical,
 * regardless of distance. Each original-only entry pairs with the first
 * unconsumed ghost-only entry in emission order, even when a later duplicate
 * sits closer.
 */
export function filterFalsePositives(lines: readonly DiffLine[]): DiffLine[] {
  const originalOnly: Positioned[] = [];
  const ghostOnly: Positioned[] = [];

  lines.forEach((line, position) => {
    if (line.type === "onlyInOriginal") {
      originalOnly.push({ position, text: trimLine(line.originalText) });
    } else if (line.type === "onlyInGhost") {
      ghostOnly.push({ position, text: trimLine(line.ghostText) });
    }
  });

  const skip = new Set<number>();
  for (const original of originalOnly) {
    if (original.text.length === 0) {
      continue;
    }
    const counterpart = ghostOnly.find(
      (ghost) => !skip.has(ghost.position) && ghost.text === original.text
    );
    if (counterpart) {
      skip.add(original.position);
      skip.add(counterpart.position);
    }
  }

  if (skip.size === 0) {
    return lines.slice();
  }
  return lines.filter((_line, position) => !skip.has(position));
}
