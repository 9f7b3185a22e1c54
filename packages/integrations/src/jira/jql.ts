/**
 * Small JQL building helpers. Values are always quoted so status names
 * with spaces ("Listo para Prod") and account ids survive intact.
 */

/** Quote a JQL string literal */
export function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Render a parenthesised, quoted value list for `in (...)` clauses */
export function jqlList(values: readonly string[]): string {
  return `(${values.map(quoteJql).join(', ')})`;
}

/** Join non-empty clauses with AND */
export function jqlAnd(...clauses: Array<string | undefined | false>): string {
  return clauses.filter((c): c is string => typeof c === 'string' && c.length > 0).join(' AND ');
}

/** Join clauses with OR, parenthesised when there is more than one */
export function jqlOr(clauses: readonly string[]): string {
  if (clauses.length === 1) return clauses[0];
  return `(${clauses.join(' OR ')})`;
}
