/**
 * Rendering of parameterised CQL for the statement log.
 *
 * Statements are executed with bound parameters; the rendered form only
 * exists so the log shows what ran with actual values.
 *
 * @module store/cql
 */

/**
 * Formats one bound value as a CQL literal.
 */
export function formatCqlLiteral(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (typeof value === 'string') {
    return `'${value.replace(/'/g, "''")}'`;
  }
  if (value instanceof Date) {
    return `'${value.toISOString()}'`;
  }
  return String(value);
}

/**
 * Replaces each `?` placeholder, left to right, with its bound value.
 * Placeholders without a value are left in place.
 *
 * @example
 * ```typescript
 * renderCql('SELECT * FROM ks.t WHERE id = ?', ["it's"]);
 * // "SELECT * FROM ks.t WHERE id = 'it''s'"
 * ```
 */
export function renderCql(query: string, params: readonly unknown[] = []): string {
  let index = 0;
  return query.replace(/\?/g, (placeholder) => {
    if (index >= params.length) {
      return placeholder;
    }
    const literal = formatCqlLiteral(params[index]);
    index += 1;
    return literal;
  });
}
