import type { Config } from "./config.js";
import type { CollapsedSection, DiffLine, DiffResult } from "./diff.js";
import { countDifferences } from "./diff.js";

export interface DiagnosticsBundle {
  version: "0.1.0";
  createdAt: string;
  redacted: boolean;
  summary: {
    lineCount: number;
    differenceCount: number;
    sectionCount: number;
  };
  config?: Config;
  result: DiffResult;
}

function redactLine(line: DiffLine): DiffLine {
  switch (line.type) {
    case "onlyInOriginal":
      return { ...line, originalText: "" };
    case "onlyInGhost":
      return { ...line, ghostText: "" };
    default:
      return { ...line, originalText: "", ghostText: "" };
  }
}

function redactSection(section: CollapsedSection): CollapsedSection {
  return { ...section, preview: "" };
}

function redactResult(result: DiffResult): DiffResult {
  return {
    lines: result.lines.map(redactLine),
    sections: result.sections.map(redactSection),
  };
}

export function createDiagnosticsBundle(options: {
  result: DiffResult;
  config?: Config;
  includeText?: boolean;
}): DiagnosticsBundle {
  const includeText = options.includeText ?? false;
  const result = includeText ? options.result : redactResult(options.result);

  return {
    version: "0.1.0",
    createdAt: new Date().toISOString(),
    redacted: !includeText,
    summary: {
      lineCount: result.lines.length,
      differenceCount: countDifferences(result),
      sectionCount: result.sections.length,
    },
    ...(options.config ? { config: options.config } : {}),
    result,
  };
}
