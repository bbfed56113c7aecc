import type { Row } from './warehouse';

function cellText(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Plain-text grid with right-aligned columns, used in LLM prompts. */
export function formatTable(columns: string[], rows: Row[]): string {
  if (columns.length === 0) return '';
  const cells = rows.map((row) => columns.map((column) => cellText(row[column])));
  const widths = columns.map((column, i) =>
    Math.max(column.length, ...cells.map((line) => (line[i] ?? '').length))
  );
  const render = (line: string[]) =>
    line.map((cell, i) => cell.padStart(widths[i] ?? cell.length)).join('  ');
  return [render(columns), ...cells.map(render)].join('\n');
}

function csvField(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = cellText(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(columns: string[], rows: Row[]): string {
  const lines = [columns.map(csvField), ...rows.map((row) => columns.map((column) => csvField(row[column])))];
  return lines.map((line) => line.join(',')).join('\n') + '\n';
}
