/**
 * Collection helpers
 */

/**
 * Index records by key, skipping records without one; later records win
 */
export function indexBy<T>(records: readonly T[], keyOf: (record: T) => string | null): Map<string, T> {
  const index = new Map<string, T>();
  for (const record of records) {
    const key = keyOf(record);
    if (key !== null) {
      index.set(key, record);
    }
  }
  return index;
}
