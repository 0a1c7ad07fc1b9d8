import { describe, expect, it } from 'vitest';
import { daysBetween, isoWeekKey, periodKey } from './period';

describe('isoWeekKey', () => {
  it('numbers Monday-based ISO weeks', () => {
    expect(isoWeekKey('2024-01-01')).toBe('2024-W01');
    expect(isoWeekKey('2024-01-15')).toBe('2024-W03');
    expect(isoWeekKey('2024-01-21')).toBe('2024-W03');
  });

  it('assigns year-boundary days to their ISO week-year', () => {
    expect(isoWeekKey('2023-01-01')).toBe('2022-W52');
    expect(isoWeekKey('2020-12-31')).toBe('2020-W53');
    expect(isoWeekKey('2021-01-03')).toBe('2020-W53');
    expect(isoWeekKey('2024-12-30')).toBe('2025-W01');
  });
});

describe('periodKey', () => {
  it('buckets a date by day, week or month', () => {
    expect(periodKey('2024-07-04', 'daily')).toBe('2024-07-04');
    expect(periodKey('2024-07-04', 'weekly')).toBe('2024-W27');
    expect(periodKey('2024-07-04', 'monthly')).toBe('2024-07');
  });
});

describe('daysBetween', () => {
  it('counts whole calendar days', () => {
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
    expect(daysBetween('2024-03-09', '2024-03-11')).toBe(2);
    expect(daysBetween('2024-05-05', '2024-05-05')).toBe(0);
  });
});
