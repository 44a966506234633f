import * as z from 'zod/v4';
import { fromZodError } from '../errors.js';
import { BUDGET_PERIODS, TRANSACTION_TYPES } from '../store/types.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const END_OF_DAY_MS = 24 * 60 * 60 * 1000 - 1;

export const nonEmptyString = z.string().trim().min(1);
export const entityIdSchema = z.number().int().positive();
/** Path and query ids arrive as strings. */
export const idSchema = z.coerce.number().int().positive();
export const amountSchema = z.number().nonnegative();
export const transactionTypeSchema = z.enum(TRANSACTION_TYPES);
export const periodSchema = z.enum(BUDGET_PERIODS);

const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})$/;

/** Rejects calendar days that do not exist, such as 2024-02-31. */
const isCalendarDay = (value: string): boolean => {
  const [year, month, day] = value.slice(0, 10).split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

const isIsoDate = (value: string): boolean =>
  (DATE_ONLY.test(value) || DATE_TIME.test(value)) && isCalendarDay(value) && !Number.isNaN(Date.parse(value));

/** `YYYY-MM-DD`, or a date-time with `Z` or an explicit offset. */
export const isoDateString = z.string().trim().refine(isIsoDate, {
  message: 'Date must be YYYY-MM-DD or an ISO-8601 date-time with Z or an offset'
});

/** A bare date is midnight UTC. */
export const toDate = (value: string): Date => new Date(value);

/** Like toDate, but a bare date stands for the last millisecond of that day. */
export const toEndDate = (value: string): Date => {
  const date = new Date(value);
  return DATE_ONLY.test(value.trim()) ? new Date(date.getTime() + END_OF_DAY_MS) : date;
};

export const dateSchema = isoDateString.transform(toDate);
export const endDateSchema = isoDateString.transform(toEndDate);

export const parseInput = <S extends z.ZodType>(schema: S, input: unknown): z.output<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
};
