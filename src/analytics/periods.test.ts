import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import { formatMonthLabel, resolvePeriodWindow, trailingMonthWindows } from './periods.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');

describe('resolvePeriodWindow', () => {
  it('resolves rolling windows that end at the query instant', () => {
    expect(resolvePeriodWindow('weekly', NOW)).toEqual({ start: new Date('2024-06-08T12:00:00.000Z'), end: NOW });
    expect(resolvePeriodWindow('monthly', NOW)).toEqual({ start: new Date('2024-05-16T12:00:00.000Z'), end: NOW });
    expect(resolvePeriodWindow('yearly', NOW)).toEqual({ start: new Date('2023-06-16T12:00:00.000Z'), end: NOW });
  });

  it('rejects unknown periods', () => {
    expect(() => resolvePeriodWindow('daily', NOW))
      .toThrow(new ValidationError('Unknown period "daily". Use one of: weekly, monthly, yearly'));
  });
});

describe('trailingMonthWindows', () => {
  it('returns calendar months oldest first, ending with the current one', () => {
    const windows = trailingMonthWindows(3, NOW);
    expect(windows.map(w => w.label)).toEqual(['2024-04', '2024-05', '2024-06']);
    expect(windows[0].start.toISOString()).toBe('2024-04-01T00:00:00.000Z');
    expect(windows[0].end.toISOString()).toBe('2024-05-01T00:00:00.000Z');
    expect(windows[2].end.toISOString()).toBe('2024-07-01T00:00:00.000Z');
  });

  it('crosses year boundaries', () => {
    const windows = trailingMonthWindows(3, new Date('2024-01-31T23:00:00.000Z'));
    expect(windows.map(w => w.label)).toEqual(['2023-11', '2023-12', '2024-01']);
  });

  it('rejects month counts outside 1..120', () => {
    expect(() => trailingMonthWindows(0, NOW)).toThrow(ValidationError);
    expect(() => trailingMonthWindows(1.5, NOW)).toThrow(ValidationError);
    expect(() => trailingMonthWindows(121, NOW)).toThrow(ValidationError);
    expect(trailingMonthWindows(120, NOW)).toHaveLength(120);
  });
});

describe('formatMonthLabel', () => {
  it('pads the month', () => {
    expect(formatMonthLabel(new Date('2024-02-29T00:00:00.000Z'))).toBe('2024-02');
  });
});
