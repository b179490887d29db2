import type { DelimitedTable } from '../types.js';

export const UTF8_BOM = '\uFEFF';

export function escapeCell(value: string): string {
  const needsQuote = /[",\r\n]/.test(value);
  const escaped = value.replace(/"/g, '""');
  return needsQuote ? `"${escaped}"` : escaped;
}

function toRow(cells: readonly string[]): string {
  return cells.map((cell) => escapeCell(cell)).join(',');
}

/** Header line, then one line per row, each terminated by `\n`. */
export function toCsv(table: DelimitedTable): string {
  const lines = [toRow(table.columns), ...table.rows.map((row) => toRow(row))];
  return `${lines.join('\n')}\n`;
}
