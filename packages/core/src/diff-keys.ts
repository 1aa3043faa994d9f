const JSON_KEY_RE = /^\s*"([^"]+)"\s*:/;
const YAML_KEY_RE = /^\s*([^:]+):/;
const QUOTE_RE = /"/g;
const COLON_RE = /:/g;

/**
 * Heuristic structural key of a JSON- or YAML-shaped line.
 *
 * The quoted pattern wins over the bare one. A colon inside a value can yield
 * a spurious key, and `- name: x` yields `- name`; both are accepted.
 */
export function extractKey(line: string): string | null {
  const trimmed = line.trim();

  const jsonMatch = JSON_KEY_RE.exec(trimmed);
  if (jsonMatch) {
    return (jsonMatch[0] ?? "").replace(QUOTE_RE, "").replace(COLON_RE, "").trim();
  }

  const yamlMatch = YAML_KEY_RE.exec(trimmed);
  if (yamlMatch) {
    return (yamlMatch[0] ?? "").replace(COLON_RE, "").trim();
  }

  return null;
}

export function sameKey(left: string, right: string) {
  const leftKey = extractKey(left);
  const rightKey = extractKey(right);
  return leftKey !== null && rightKey !== null && leftKey === rightKey;
}
