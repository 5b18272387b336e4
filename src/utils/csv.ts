export interface CsvColumn {
  key: string;
  header: string;
}

export function csvCell(raw: unknown): string {
  if (raw === null || raw === undefined) return '';
  const str = Array.isArray(raw) ? raw.join('; ') : String(raw);
  if (str.includes('"') || str.includes(',') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function buildCsvContent(rows: Record<string, unknown>[], columns: CsvColumn[]): string {
  const lines: string[] = [];
  lines.push(columns.map(col => csvCell(col.header)).join(','));

  for (const row of rows) {
    lines.push(columns.map(col => csvCell(row[col.key])).join(','));
  }

  return lines.join('\n');
}
