/**
 * Minimal RFC 4180 writer. Fields containing a comma, quote or line break
 * are quoted, with quotes doubled. Lines end with LF, including the last.
 */

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const lines = [header, ...rows].map((row) => row.map(escapeField).join(','));
  return `${lines.join('\n')}\n`;
}
