import { CURRENCY, CURRENCY_LOCALE } from '../config';

export function formatCurrency(value: number): string {
  return value.toLocaleString(CURRENCY_LOCALE, {
    style: 'currency',
    currency: CURRENCY,
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
