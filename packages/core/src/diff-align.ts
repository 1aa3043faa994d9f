import { sameKey } from "./diff-keys.js";
import type { DiffLine } from "./diff-line.js";
import {
  matchLine,
  modifiedLine,
  onlyInGhost,
  onlyInOriginal,
} from "./diff-line.js";
import { trimLine } from "./diff-lines.js";
import {
  DEFAULT_LOOKAHEAD_WINDOW,
  findLookaheadMatch,
} from "./diff-lookahead.js";

export interface AlignOptions {
  lookaheadWindow?: number | undefined;
}

export type AmbiguousStep = "insertGhost" | "deleteOriginal" | "modify";

/**
 * Decides a step whose lines differ in content and key.
 *
 * `ghostOffset` is where the current original line reappears in the ghost,
 * `originalOffset` where the current ghost line reappears in the original.
 * On equal offsets the ghost insertion wins.
 */
export function resolveAmbiguousStep(
  ghostOffset: number | null,
  originalOffset: number | null
): AmbiguousStep {
  if (
    ghostOffset !== null &&
    (originalOffset === null || ghostOffset <= originalOffset)
  ) {
    return "insertGhost";
  }
  if (originalOffset !== null) {
    return "deleteOriginal";
  }
  return "modify";
}

export function alignLines(
  original: readonly string[],
  ghost: readonly string[],
  options: AlignOptions = {}
): DiffLine[] {
  const window = options.lookaheadWindow ?? DEFAULT_LOOKAHEAD_WINDOW;
  const result: DiffLine[] = [];
  let originalIndex = 0;
  let ghostIndex = 0;

  while (originalIndex < original.length || ghostIndex < ghost.length) {
    const originalText = original[originalIndex];
    const ghostText = ghost[ghostIndex];

    if (ghostText === undefined) {
      if (originalText === undefined) {
        break;
      }
      result.push(onlyInOriginal({ index: originalIndex, text: originalText }));
      originalIndex += 1;
      continue;
    }
    if (originalText === undefined) {
      result.push(onlyInGhost({ index: ghostIndex, text: ghostText }));
      ghostIndex += 1;
      continue;
    }

    const originalRef = { index: originalIndex, text: originalText };
    const ghostRef = { index: ghostIndex, text: ghostText };
    const trimmedOriginal = trimLine(originalText);
    const trimmedGhost = trimLine(ghostText);

    if (trimmedOriginal === trimmedGhost) {
      result.push(matchLine(originalRef, ghostRef));
      originalIndex += 1;
      ghostIndex += 1;
      continue;
    }

    if (sameKey(trimmedOriginal, trimmedGhost)) {
      result.push(modifiedLine(originalRef, ghostRef));
      originalIndex += 1;
      ghostIndex += 1;
      continue;
    }

    const step = resolveAmbiguousStep(
      findLookaheadMatch(trimmedOriginal, ghost, ghostIndex, window),
      findLookaheadMatch(trimmedGhost, original, originalIndex, window)
    );
    switch (step) {
      case "insertGhost":
        result.push(onlyInGhost(ghostRef));
        ghostIndex += 1;
        break;
      case "deleteOriginal":
        result.push(onlyInOriginal(originalRef));
        originalIndex += 1;
        break;
      default:
        result.push(modifiedLine(originalRef, ghostRef));
        originalIndex += 1;
        ghostIndex += 1;
    }
  }

  return result;
}
