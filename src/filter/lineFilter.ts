/**
 * Line Filter
 *
 * Drops log lines that contain any configured ignore substring.
 * Matching is literal and case-sensitive.
 */

/**
 * Returns false iff some pattern occurs in the line
 */
export function shouldInclude(line: string, ignorePatterns: ReadonlySet<string>): boolean {
  for (const pattern of ignorePatterns) {
    if (line.includes(pattern)) {
      return false;
    }
  }
  return true;
}

/**
 * Accept a single pattern or a list of them; empty entries mean "nothing"
 */
export function normalizeIgnorePatterns(
  input: string | Iterable<string> | undefined
): ReadonlySet<string> {
  if (input === undefined) {
    return new Set();
  }
  const patterns = typeof input === 'string' ? [input] : Array.from(input);
  return new Set(patterns.filter((pattern) => pattern.length > 0));
}
