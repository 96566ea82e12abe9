/** Case-fold and collapse whitespace so summaries compare by content only. */
export function normalizeSummary(summary: string): string {
  return summary.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Keys are compared upper-case; Jira treats them case-insensitively. */
export function normalizeKey(key: string): string {
  return key.trim().toUpperCase();
}

/** Project part of an issue key ("PROJ-42" -> "PROJ"), or null */
export function projectOfKey(key: string): string | null {
  const dash = key.lastIndexOf('-');
  if (dash <= 0) return null;
  return key.slice(0, dash);
}
