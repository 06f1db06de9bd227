/** CSV column separator. */
const SEP = ',';

/**
 * Quote a cell when it holds a separator, quote or line break.
 * null and undefined become empty cells.
 */
export function csvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'string' ? value : typeof value === 'object' ? JSON.stringify(value) : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render rows as CSV with a header line. Columns missing on a row become empty cells.
 */
export function toCsv(
  columns: readonly string[],
  rows: readonly Readonly<Record<string, unknown>>[],
): string {
  const header = columns.map(csvCell).join(SEP);
  const lines = rows.map((row) => columns.map((column) => csvCell(row[column])).join(SEP));
  return [header, ...lines].join('\n');
}
