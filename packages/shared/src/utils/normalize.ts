/**
 * Canonical form of every permission, group and username key:
 * surrounding whitespace removed, lowercased.
 */
export function normalizeName(value: string | null | undefined): string {
  if (typeof value !== 'string') return '';
  return value.trim().toLowerCase();
}

/** Trims without changing case; for ids and display fields. */
export function trimOrEmpty(value: string | null | undefined): string {
  return typeof value === 'string' ? value.trim() : '';
}
