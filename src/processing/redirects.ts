/**
 * Replace redirect titles by their destinations
 */

/**
 * Swap every title for its redirect destination and drop duplicates
 *
 * Titles mapped to null, or absent from the map, are kept as they are.
 * The first occurrence of each resulting title wins.
 */
export function overwriteRedirects(
  titles: readonly string[],
  redirects: ReadonlyMap<string, string | null>
): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const title of titles) {
    const resolved = redirects.get(title) ?? title;
    if (!seen.has(resolved)) {
      seen.add(resolved);
      result.push(resolved);
    }
  }
  return result;
}
