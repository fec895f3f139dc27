/**
 * Group rows by timestamp key, preserving input order within each key.
 */
export function indexByTimestamp<T extends { timestamp: string }>(
  rows: readonly T[],
): Map<string, T[]> {
  const index = new Map<string, T[]>();
  for (const row of rows) {
    const bucket = index.get(row.timestamp);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(row.timestamp, [row]);
    }
  }
  return index;
}

/**
 * Inner join on exact timestamp equality.
 *
 * Duplicate keys pair up many-to-many. Output follows `left` order, then
 * `right` order for each left row.
 */
export function innerJoinOnTimestamp<
  L extends { timestamp: string },
  R extends { timestamp: string },
>(left: readonly L[], right: readonly R[]): Array<[L, R]> {
  const rightIndex = indexByTimestamp(right);
  const pairs: Array<[L, R]> = [];

  for (const l of left) {
    for (const r of rightIndex.get(l.timestamp) ?? []) {
      pairs.push([l, r]);
    }
  }
  return pairs;
}
