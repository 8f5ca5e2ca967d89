/**
 * Returns page `pageNumber` (1-based) of `items`. Out-of-range pages and
 * non-positive or fractional arguments give an empty page.
 */
export function page<T>(
  items: readonly T[],
  pageNumber: number,
  pageSize: number,
): T[] {
  if (
    !Number.isInteger(pageNumber) ||
    !Number.isInteger(pageSize) ||
    pageNumber < 1 ||
    pageSize < 1
  ) {
    return [];
  }

  const start = (pageNumber - 1) * pageSize;
  if (start >= items.length) {
    return [];
  }

  return items.slice(start, start + pageSize);
}

export function countPages(total: number, pageSize: number): number {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    return 0;
  }

  return Math.ceil(total / pageSize);
}
