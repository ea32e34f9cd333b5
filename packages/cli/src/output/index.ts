import Table from 'cli-table3';

export * from './tree';
export * from './renderer';

export type TableRow = Record<string, string | number>;

export function formatTable(rows: TableRow[], options?: Table.TableConstructorOptions): string {
  const head = options?.head ?? Object.keys(rows[0] ?? {});
  const table = new Table({ head, ...options });
  rows.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  return table.toString();
}

export function printTable(rows: TableRow[], options?: Table.TableConstructorOptions) {
  console.log(formatTable(rows, options));
}
