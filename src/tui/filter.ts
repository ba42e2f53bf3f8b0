/**
 * Indices of `items` whose text contains `query`, compared case-insensitively.
 * An empty query matches every item. Order follows `items`.
 */
export function filterIndices(items: readonly string[], query: string): number[] {
  if (query === '') {
    return items.map((_, index) => index);
  }

  const needle = query.toLowerCase();
  const matches: number[] = [];
  items.forEach((item, index) => {
    if (item.toLowerCase().includes(needle)) matches.push(index);
  });
  return matches;
}
