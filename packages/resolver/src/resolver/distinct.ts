/**
 * Removes duplicate records from a fetched page when distinct mode is on.
 *
 * Runs after the window has been applied, so a page with duplicates comes
 * back shorter than the requested page size while `total` and `pages` still
 * reflect the backend's own count.
 */
export function resolveDistinct<TEntity>(
  rows: readonly TEntity[],
  distinct: boolean,
  key?: (entity: TEntity) => unknown,
): readonly TEntity[] {
  if (!distinct) {
    return rows;
  }

  const seen = new Set<unknown>();
  const result: TEntity[] = [];

  for (const row of rows) {
    const identity = key === undefined ? row : key(row);
    if (seen.has(identity)) {
      continue;
    }
    seen.add(identity);
    result.push(row);
  }

  return result;
}
