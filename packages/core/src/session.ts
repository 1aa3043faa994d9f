import { Effect } from "effect";
import { compareDocumentsTraced } from "./compare.js";
import type { Config, RendererConfig } from "./config.js";
import { comparisonOptionsFrom } from "./config.js";
import type { ComparisonOptions, DiffLine, DiffResult } from "./diff.js";
import type { JumpTarget } from "./diff-navigation.js";
import {
  differenceLineAt,
  expandAllSections,
  jumpTargetFor,
  nextDifference,
  previousDifference,
  toggleSection,
} from "./diff-navigation.js";
import type { Telemetry } from "./telemetry.js";

export interface ComparisonSnapshot {
  generation: number;
  result: DiffResult;
}

export interface ComparisonSession {
  compare: (
    original: string,
    ghost: string
  ) => Effect.Effect<ComparisonSnapshot, never, Telemetry>;
  isCurrent: (generation: number) => boolean;
  result: () => DiffResult | null;
  cursor: () => number;
  expandedSections: () => ReadonlySet<number>;
  next: () => DiffLine | undefined;
  previous: () => DiffLine | undefined;
  currentLine: () => DiffLine | undefined;
  toggle: (sectionId: number) => ReadonlySet<number>;
  jumpTarget: (position: number) => JumpTarget | null;
}

export interface SessionOptions extends ComparisonOptions {
  /** Whether sections start expanded after each comparison. */
  sections?: RendererConfig["sections"] | undefined;
}

export function sessionOptionsFrom(config: Config): SessionOptions {
  return {
    ...comparisonOptionsFrom(config),
    sections: config.renderer.sections,
  };
}

/**
 * Presentation state around successive comparisons. Each `compare` bumps the
 * generation; results from older generations are stale.
 */
export function createComparisonSession(
  options: SessionOptions = {}
): ComparisonSession {
  const { sections = "expanded", ...comparison } = options;
  let generation = 0;
  let current: DiffResult | null = null;
  let cursor = 0;
  let expanded: ReadonlySet<number> = new Set();

  const currentLine = () =>
    current === null ? undefined : differenceLineAt(current, cursor);

  return {
    compare: (original, ghost) =>
      Effect.suspend(() => {
        generation += 1;
        const stamp = generation;
        return compareDocumentsTraced(original, ghost, comparison).pipe(
          Effect.map((result) => {
            if (stamp === generation) {
              current = result;
              cursor = 0;
              expanded =
                sections === "collapsed"
                  ? new Set<number>()
                  : expandAllSections(result);
            }
            return { generation: stamp, result };
          })
        );
      }),
    isCurrent: (stamp) => stamp === generation,
    result: () => current,
    cursor: () => cursor,
    expandedSections: () => expanded,
    next: () => {
      if (current !== null) {
        cursor = nextDifference(current, cursor);
      }
      return currentLine();
    },
    previous: () => {
      if (current !== null) {
        cursor = previousDifference(current, cursor);
      }
      return currentLine();
    },
    currentLine,
    toggle: (sectionId) => {
      expanded = toggleSection(expanded, sectionId);
      return expanded;
    },
    jumpTarget: (position) => {
      const line = current?.lines[position];
      return line === undefined ? null : jumpTargetFor(line);
    },
  };
}
