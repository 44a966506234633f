import { ValidationError } from '../errors.js';
import { BUDGET_PERIODS, isBudgetPeriod, type BudgetPeriod } from '../store/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Rolling window lengths, anchored at the query instant. */
export const PERIOD_LENGTH_DAYS: Record<BudgetPeriod, number> = {
  weekly: 7,
  monthly: 30,
  yearly: 365
};

/** Both bounds inclusive. */
export interface PeriodWindow {
  start: Date
  end: Date
}

/** Start inclusive, end exclusive. */
export interface MonthWindow {
  label: string
  start: Date
  end: Date
}

export const MAX_TREND_MONTHS = 120;

export const resolvePeriodWindow = (period: string, now: Date): PeriodWindow => {
  if (!isBudgetPeriod(period)) {
    throw new ValidationError(`Unknown period "${period}". Use one of: ${BUDGET_PERIODS.join(', ')}`);
  }
  return {
    start: new Date(now.getTime() - PERIOD_LENGTH_DAYS[period] * DAY_MS),
    end: now
  };
};

export const formatMonthLabel = (d: Date): string =>
  `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}`;

/**
 * The last `months` calendar months (UTC) ending with the month containing
 * `now`, oldest first.
 */
export const trailingMonthWindows = (months: number, now: Date): MonthWindow[] => {
  if (!Number.isInteger(months) || months < 1 || months > MAX_TREND_MONTHS) {
    throw new ValidationError(`Months must be an integer between 1 and ${MAX_TREND_MONTHS}`);
  }
  const windows: MonthWindow[] = [];
  for (let offset = months - 1; offset >= 0; offset--) {
    const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - offset, 1));
    const end = new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 1));
    windows.push({ label: formatMonthLabel(start), start, end });
  }
  return windows;
};
