import { REQUIRED_COLUMNS, type RequiredColumn } from '../../config';
import { extractTags } from '../groups/tags';
import type { CsvRecord, CsvTable, DataSet, Txn } from './contract';
import { ValidationError } from './errors';
import { parseCsv } from './parseCsv';

type RowLookup = Map<string, string>;

function normalizeKey(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function lookupRecord(record: CsvRecord): RowLookup {
  const map: RowLookup = new Map();
  for (const [key, value] of Object.entries(record)) {
    map.set(normalizeKey(key), value);
  }
  return map;
}

function rawValue(lookup: RowLookup, column: RequiredColumn): string {
  return lookup.get(normalizeKey(column)) ?? '';
}

function pickValue(lookup: RowLookup, column: RequiredColumn): string {
  return rawValue(lookup, column).trim();
}

export function assertRequiredColumns(headers: string[]): void {
  const present = new Set(headers.map(normalizeKey));
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(normalizeKey(column)));

  if (missing.length > 0) {
    throw new ValidationError(`Missing required column(s): ${missing.join(', ')}`, {
      columns: [...missing],
    });
  }
}

export function parseAmount(raw: string): number | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const isParenNegative = trimmed.startsWith('(') && trimmed.endsWith(')');
  const numeric = trimmed.replace(/[$,()\s]/g, '');
  if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(numeric)) return null;

  const amount = Number.parseFloat(numeric);
  if (!Number.isFinite(amount)) return null;

  return isParenNegative ? -Math.abs(amount) : amount;
}

export function parseIncomeFlag(raw: string): boolean | null {
  const value = raw.trim().toLowerCase();
  if (value === 'true') return true;
  if (value === 'false') return false;
  return null;
}

function formatLocalIsoDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

// "Feb", "Sept" and "February" all name a month; at least three letters.
function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex((month) => month.startsWith(lower));
  return index === -1 ? null : index + 1;
}

function fromDateParts(year: number, month: number, day: number): string | null {
  const candidate = new Date(year, month - 1, day);
  if (
    Number.isNaN(candidate.getTime()) ||
    candidate.getFullYear() !== year ||
    candidate.getMonth() !== month - 1 ||
    candidate.getDate() !== day
  ) {
    return null;
  }

  return formatLocalIsoDate(year, month, day);
}

export function toISODateOnly(input: string | Date): string | null {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) return null;
    return formatLocalIsoDate(input.getFullYear(), input.getMonth() + 1, input.getDate());
  }

  const value = input.trim();
  if (!value || value.includes(' - ')) return null;

  // Date-time exports keep the calendar day as written, whatever the offset.
  const isoMatch = value.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/);
  if (isoMatch) {
    const year = Number.parseInt(isoMatch[1], 10);
    const month = Number.parseInt(isoMatch[2], 10);
    const day = Number.parseInt(isoMatch[3], 10);
    return fromDateParts(year, month, day);
  }

  const slashMatch = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2,4})$/);
  if (slashMatch) {
    const month = Number.parseInt(slashMatch[1], 10);
    const day = Number.parseInt(slashMatch[2], 10);
    let year = Number.parseInt(slashMatch[3], 10);
    if (year < 100) {
      year += year >= 70 ? 1900 : 2000;
    }
    return fromDateParts(year, month, day);
  }

  const monthFirst = value.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1]);
    if (month === null) return null;
    return fromDateParts(Number.parseInt(monthFirst[3], 10), month, Number.parseInt(monthFirst[2], 10));
  }

  const dayFirst = value.match(/^(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})$/);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2]);
    if (month === null) return null;
    return fromDateParts(Number.parseInt(dayFirst[3], 10), month, Number.parseInt(dayFirst[1], 10));
  }

  return null;
}

function invalid(rowNumber: number, field: RequiredColumn, detail: string): ValidationError {
  return new ValidationError(`Row ${rowNumber}: ${field} ${detail}`, { row: rowNumber, field });
}

type ParsedRow = {
  txn: Txn;
  rawAmount: number;
};

function toTransaction(record: CsvRecord, rowNumber: number): ParsedRow {
  const lookup = lookupRecord(record);

  const dateValue = pickValue(lookup, 'date');
  const isoDate = toISODateOnly(dateValue);
  if (!isoDate) {
    throw invalid(rowNumber, 'date', `"${dateValue}" is not a calendar date`);
  }

  const amountValue = pickValue(lookup, 'amount');
  const rawAmount = parseAmount(amountValue);
  if (rawAmount === null) {
    throw invalid(rowNumber, 'amount', `"${amountValue}" is not numeric`);
  }

  const incomeValue = pickValue(lookup, 'income');
  const isIncome = parseIncomeFlag(incomeValue);
  if (isIncome === null) {
    throw invalid(rowNumber, 'income', `"${incomeValue}" is not true or false`);
  }

  const category = pickValue(lookup, 'category name');
  if (!category) {
    throw invalid(rowNumber, 'category name', 'is empty');
  }

  const title = pickValue(lookup, 'title');
  const note = rawValue(lookup, 'note');
  const kind = isIncome ? 'income' : 'expense';
  const amount = Math.abs(rawAmount);

  const txn: Txn = Object.freeze({
    id: `${rowNumber}|${isoDate}|${title}`,
    date: isoDate,
    month: isoDate.slice(0, 7),
    kind,
    amount,
    signedAmount: kind === 'expense' ? -amount : amount,
    category,
    subcategory: pickValue(lookup, 'subcategory name'),
    title,
    note,
    tags: Object.freeze(extractTags(note)),
  });

  return { txn, rawAmount };
}

/**
 * Validates the header and converts every record. The first bad row aborts
 * the whole load.
 */
export function loadTransactions(table: CsvTable): Txn[] {
  assertRequiredColumns(table.headers);

  const parsed = table.records.map((record, index) => toTransaction(record, index + 1));

  const negativeAmounts = parsed.filter((row) => row.rawAmount < 0).length;
  if (negativeAmounts > 0) {
    console.warn(`[data] Normalized ${negativeAmounts} negative amount(s) to magnitudes; income flag decides the kind.`);
  }

  return parsed.map((row) => row.txn).sort((a, b) => a.date.localeCompare(b.date));
}

export function loadCsv(text: string, source: string): DataSet {
  return {
    txns: loadTransactions(parseCsv(text)),
    loadedAtIso: new Date().toISOString(),
    source,
  };
}
