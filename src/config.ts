import type { Granularity } from './lib/data/contract';

export const APP_TITLE = 'Personal Expense Analyzer';

export const REQUIRED_COLUMNS = [
  'date',
  'amount',
  'income',
  'category name',
  'subcategory name',
  'title',
  'note',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export const DEFAULT_GRANULARITY: Granularity = 'monthly';

export const TOP_N = 10;

export const CURRENCY_LOCALE = 'en-US';
export const CURRENCY = 'USD';
