/**
 * Split a raw input line into its whitespace-delimited tokens
 *
 * Leading, trailing and repeated whitespace (including newlines) is dropped.
 * An empty or blank line yields an empty list.
 */
export function tokenize(line: string): string[] {
  return line.split(/\s+/).filter((token) => token.length > 0);
}
