/**
 * Flatten several pattern lists into one, keeping the first occurrence of
 * every pattern. Patterns compare by exact string equality.
 */
export function dedupePatterns(lists: readonly (readonly string[])[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const list of lists) {
    for (const pattern of list) {
      if (!seen.has(pattern)) {
        seen.add(pattern);
        result.push(pattern);
      }
    }
  }

  return result;
}
