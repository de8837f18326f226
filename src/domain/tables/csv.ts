/**
 * CSV rendering for the analysis tables
 */

type Cell = string | number | boolean | null | undefined;

function formatCell(value: Cell): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render rows as CSV with a header line. Columns default to the keys of the first row.
 */
export function formatCsv<Row extends object>(
  rows: readonly Row[],
  columns?: readonly (keyof Row & string)[]
): string {
  const first = rows[0];
  const header: string[] = columns
    ? [...columns]
    : first
      ? Object.keys(first)
      : [];

  const lines = [header.map(formatCell).join(',')];
  for (const row of rows) {
    const cells = new Map<string, unknown>(Object.entries(row));
    lines.push(
      header
        .map((column) => {
          const value = cells.get(column);
          return formatCell(
            typeof value === 'string' ||
              typeof value === 'number' ||
              typeof value === 'boolean' ||
              value === null
              ? value
              : undefined
          );
        })
        .join(',')
    );
  }
  return lines.join('\n');
}
