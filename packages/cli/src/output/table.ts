import Table from 'cli-table3';

export type TableRow = Record<string, string | number>;

/**
 * Renders rows as a table; the column headings are the keys of the first row.
 */
export function formatTable(rows: readonly TableRow[], options: Table.TableConstructorOptions = {}): string {
  if (rows.length === 0) return '';
  const head = options.head ?? Object.keys(rows[0]);
  const table = new Table({ ...options, head });
  rows.forEach((row) => table.push(head.map((key) => String(row[key] ?? ''))));
  return table.toString();
}
