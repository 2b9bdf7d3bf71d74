function isIndexIn(list: unknown[], index: number) {
  return Number.isInteger(index) && index >= 0 && index < list.length;
}

/**
 * Reads `data[i][j]` as a string. Anything else (out of range, a non-array at
 * either level, a non-string leaf) reads as "".
 */
export function safeGetNested(data: unknown, i: number, j: number): string {
  if (!Array.isArray(data) || !isIndexIn(data, i)) return "";
  const row: unknown = data[i];
  if (!Array.isArray(row) || !isIndexIn(row, j)) return "";
  const value: unknown = row[j];
  return typeof value === "string" ? value : "";
}
