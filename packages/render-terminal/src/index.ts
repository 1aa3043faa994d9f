import type {
  CollapsedSection,
  DiffLine,
  DiffResult,
  RendererConfig,
} from "@ghostdiff/core";
import {
  countDifferences,
  describeSection,
  expandAllSections,
  renderJson,
} from "@ghostdiff/core";

export interface TerminalRenderOptions {
  format?: "ansi" | "plain";
  layout?: "unified" | "side-by-side";
  /** Ids of sections whose lines are shown; all others render collapsed. */
  expandedSections?: ReadonlySet<number>;
  /** Column width of each side in the side-by-side layout. */
  width?: number;
}

const ansiColors = {
  reset: "\u001b[0m",
  green: "\u001b[32m",
  red: "\u001b[31m",
  yellow: "\u001b[33m",
  cyan: "\u001b[36m",
  gray: "\u001b[90m",
};

const LINE_NUMBER_WIDTH = 4;

function colorize(
  text: string,
  color: keyof typeof ansiColors,
  enabled: boolean
) {
  if (!enabled) {
    return text;
  }
  return `${ansiColors[color]}${text}${ansiColors.reset}`;
}

function padLeft(text: string, width: number) {
  if (text.length >= width) {
    return text;
  }
  return text.padStart(width, " ");
}

function padRight(text: string, width: number) {
  if (text.length >= width) {
    return `${text.slice(0, Math.max(width - 3, 0))}...`;
  }
  return text.padEnd(width, " ");
}

function summaryLine(result: DiffResult) {
  const count = countDifferences(result);
  if (count === 0) {
    return "No differences.";
  }
  return count === 1 ? "1 difference" : `${count} differences`;
}

function unifiedRow(lineNumber: number, marker: string, text: string) {
  return `${padLeft(String(lineNumber + 1), LINE_NUMBER_WIDTH)} ${marker} ${text}`;
}

function renderUnifiedLine(line: DiffLine, ansi: boolean): string[] {
  switch (line.type) {
    case "match":
      return [unifiedRow(line.originalIndex, " ", line.originalText)];
    case "modified":
      return [
        colorize(
          unifiedRow(line.originalIndex, "-", line.originalText),
          "red",
          ansi
        ),
        colorize(unifiedRow(line.ghostIndex, "+", line.ghostText), "green", ansi),
      ];
    case "onlyInOriginal":
      return [
        colorize(
          unifiedRow(line.originalIndex, "-", line.originalText),
          "red",
          ansi
        ),
      ];
    case "onlyInGhost":
      return [
        colorize(unifiedRow(line.ghostIndex, "+", line.ghostText), "green", ansi),
      ];
    default:
      return [];
  }
}

function sideBySideLabel(line: DiffLine, ansi: boolean) {
  switch (line.type) {
    case "modified":
      return colorize("modified", "yellow", ansi);
    case "onlyInOriginal":
      return colorize("original only", "red", ansi);
    case "onlyInGhost":
      return colorize("ghost only", "green", ansi);
    default:
      return "";
  }
}

function renderSideBySideLine(line: DiffLine, ansi: boolean, width: number) {
  const row = `${padRight(line.originalText ?? "", width)} | ${padRight(
    line.ghostText ?? "",
    width
  )}`;
  const label = sideBySideLabel(line, ansi);
  return [label ? `${row}  ${label}` : row];
}

function renderSectionHeader(
  section: CollapsedSection,
  expanded: boolean,
  ansi: boolean
) {
  const marker = expanded ? "▾" : "▸";
  return [
    colorize(`${marker} ${describeSection(section)}`, "cyan", ansi),
    colorize(`    ${section.preview}`, "gray", ansi),
  ];
}

export function renderTerminal(
  result: DiffResult,
  options: TerminalRenderOptions = {}
) {
  const ansi = (options.format ?? "ansi") === "ansi";
  const layout = options.layout ?? "unified";
  const width = options.width ?? 40;
  const expanded = options.expandedSections ?? new Set<number>();
  const renderLine = (line: DiffLine) =>
    layout === "side-by-side"
      ? renderSideBySideLine(line, ansi, width)
      : renderUnifiedLine(line, ansi);

  const output = [summaryLine(result)];
  if (layout === "side-by-side") {
    output.push(`${padRight("ORIGINAL", width)} | ${padRight("GHOST", width)}`);
  }

  const sectionsByStart = new Map(
    result.sections.map((section) => [section.start, section])
  );
  let position = 0;
  while (position < result.lines.length) {
    const section = sectionsByStart.get(position);
    if (section) {
      const isExpanded = expanded.has(section.id);
      output.push(...renderSectionHeader(section, isExpanded, ansi));
      if (isExpanded) {
        for (const line of result.lines.slice(section.start, section.end + 1)) {
          output.push(...renderLine(line));
        }
      }
      position = section.end + 1;
      continue;
    }
    const line = result.lines[position];
    if (line) {
      output.push(...renderLine(line));
    }
    position += 1;
  }
  return output.join("\n");
}

export function terminalOptionsFrom(
  renderer: RendererConfig,
  result: DiffResult
): TerminalRenderOptions {
  return {
    format: renderer.format === "plain" ? "plain" : "ansi",
    layout: renderer.layout,
    expandedSections:
      renderer.sections === "collapsed"
        ? new Set<number>()
        : expandAllSections(result),
  };
}

/**
 * Renders a result the way the `renderer` config section asks. A caller-held
 * expanded set, such as a session's, replaces the configured starting state.
 */
export function renderResult(
  result: DiffResult,
  renderer: RendererConfig,
  expandedSections?: ReadonlySet<number>
) {
  if (renderer.format === "json") {
    return renderJson(result);
  }
  const options = terminalOptionsFrom(renderer, result);
  return renderTerminal(
    result,
    expandedSections ? { ...options, expandedSections } : options
  );
}
