// CRLF is one boundary; LF, VT, FF, CR, NEL, LS and PS each end a line.
export const LINE_SPLIT_RE = /\r\n|[\n\v\f\r\u0085\u2028\u2029]/;

export function splitLines(text: string) {
  return text.split(LINE_SPLIT_RE);
}

export function trimLine(line: string) {
  return line.trim();
}
