export type DiffLineType = "match" | "modified" | "onlyInOriginal" | "onlyInGhost";

interface PairedLine<T extends "match" | "modified"> {
  readonly type: T;
  readonly originalIndex: number;
  readonly ghostIndex: number;
  readonly originalText: string;
  readonly ghostText: string;
}

export type MatchLine = PairedLine<"match">;
export type ModifiedLine = PairedLine<"modified">;

export interface OnlyInOriginalLine {
  readonly type: "onlyInOriginal";
  readonly originalIndex: number;
  readonly ghostIndex?: undefined;
  readonly originalText: string;
  readonly ghostText?: undefined;
}

export interface OnlyInGhostLine {
  readonly type: "onlyInGhost";
  readonly originalIndex?: undefined;
  readonly ghostIndex: number;
  readonly originalText?: undefined;
  readonly ghostText: string;
}

export type DiffLine =
  | MatchLine
  | ModifiedLine
  | OnlyInOriginalLine
  | OnlyInGhostLine;

export interface LineRef {
  index: number;
  text: string;
}

export function matchLine(original: LineRef, ghost: LineRef): MatchLine {
  return {
    type: "match",
    originalIndex: original.index,
    ghostIndex: ghost.index,
    originalText: original.text,
    ghostText: ghost.text,
  };
}

export function modifiedLine(original: LineRef, ghost: LineRef): ModifiedLine {
  return {
    type: "modified",
    originalIndex: original.index,
    ghostIndex: ghost.index,
    originalText: original.text,
    ghostText: ghost.text,
  };
}

export function onlyInOriginal(original: LineRef): OnlyInOriginalLine {
  return {
    type: "onlyInOriginal",
    originalIndex: original.index,
    originalText: original.text,
  };
}

export function onlyInGhost(ghost: LineRef): OnlyInGhostLine {
  return {
    type: "onlyInGhost",
    ghostIndex: ghost.index,
    ghostText: ghost.text,
  };
}

export function isDifference(line: DiffLine) {
  return line.type !== "match";
}
