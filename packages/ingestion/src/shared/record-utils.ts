/**
 * Sort by date ascending. Array.prototype.sort is stable, so same-date records keep input order.
 */
export function sortByDate<T extends { readonly date: string }>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
