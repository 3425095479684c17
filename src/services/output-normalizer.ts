/**
 * Canonical form used to compare program output with the expected output:
 * line endings unified to "\n", surrounding blank content stripped and
 * trailing whitespace removed from every line.
 */
export function normalizeOutput(content: string): string {
  const normalized = content.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
  return normalized
    .trim()
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n");
}

export function outputsMatch(actual: string, expected: string): boolean {
  return normalizeOutput(actual) === normalizeOutput(expected);
}
