import type { CsvRecord, CsvTable } from './contract';
import { ValidationError } from './errors';

type CsvRows = {
  rows: string[][];
  /** The text ended inside a quoted cell; the last row is the one left open. */
  endsInQuotes: boolean;
};

function parseCsvRows(text: string): CsvRows {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (char === '"') {
      const nextChar = text[i + 1];
      if (inQuotes && nextChar === '"') {
        cell += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === ',' && !inQuotes) {
      row.push(cell);
      cell = '';
      continue;
    }

    if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && text[i + 1] === '\n') {
        i += 1;
      }
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
      continue;
    }

    cell += char;
  }

  if (cell.length > 0 || row.length > 0 || inQuotes) {
    row.push(cell);
    rows.push(row);
  }

  return { rows, endsInQuotes: inQuotes };
}

function isBlankRow(row: string[]): boolean {
  return row.every((cell) => cell.trim().length === 0);
}

/**
 * Splits CSV text into a header row and one record per data row.
 * Header cells are trimmed; data cells are kept as written so multi-line
 * notes reach the loader untouched. Row numbers in errors count data rows
 * from 1, skipping blank lines, as the loader does.
 */
export function parseCsv(text: string): CsvTable {
  const parsed = parseCsvRows(text);
  const rows = parsed.rows.filter((row) => !isBlankRow(row));
  if (rows.length === 0) {
    return { headers: [], records: [] };
  }

  if (parsed.endsInQuotes) {
    const row = rows.length - 1;
    if (row === 0) {
      throw new ValidationError('Header row has an unterminated quote');
    }
    throw new ValidationError(`Row ${row}: unterminated quote runs to the end of the file`, { row });
  }

  const headers = rows[0].map((header) => header.trim());
  const records: CsvRecord[] = [];

  for (let i = 1; i < rows.length; i += 1) {
    const row = rows[i];
    // Trailing empty cells from spreadsheet exports carry no data.
    const extra = row.slice(headers.length);
    if (extra.some((cell) => cell.trim().length > 0)) {
      throw new ValidationError(`Row ${i}: ${row.length} cells but the header has ${headers.length}`, { row: i });
    }

    const record: CsvRecord = {};
    headers.forEach((header, position) => {
      if (!header) return;
      record[header] = row[position] ?? '';
    });

    records.push(record);
  }

  return { headers, records };
}
