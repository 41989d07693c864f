import { SearchFilter } from '../types';

// Filterable scalar fields, in the order their conditions are emitted.
const FILTER_FIELDS: Array<keyof SearchFilter> = ['title'];

export function escapeDoubleQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function escapeSingleQuoted(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Compiles a request filter into a boolean expression, e.g.
 * `{ title: 'Chapter1' }` becomes `title == "Chapter1"`.
 * Returns undefined when no condition is set.
 */
export function compileFilter(filter: SearchFilter | undefined): string | undefined {
  if (!filter) return undefined;

  const conditions: string[] = [];
  for (const field of FILTER_FIELDS) {
    const value = filter[field];
    if (value) {
      conditions.push(`${field} == "${escapeDoubleQuoted(value)}"`);
    }
  }

  return conditions.length ? conditions.join(' && ') : undefined;
}

export function conjoin(...clauses: Array<string | undefined>): string | undefined {
  const present = clauses.filter((c): c is string => Boolean(c));
  return present.length ? present.join(' && ') : undefined;
}
