/**
 * Rewrites positional `?` markers to pg's `$1..$n`. Generated statements never
 * contain quoted literals, so every `?` is a placeholder.
 */
export function toNativePlaceholders(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => {
    n += 1;
    return `$${n}`;
  });
}

/** Number of `?` placeholders in a statement. */
export function countPlaceholders(sql: string): number {
  return (sql.match(/\?/g) ?? []).length;
}
