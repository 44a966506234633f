import * as z from 'zod/v4';
import { MAX_TREND_MONTHS } from '../analytics/periods.js';
import {
  amountSchema,
  dateSchema,
  endDateSchema,
  entityIdSchema,
  idSchema,
  nonEmptyString,
  periodSchema,
  transactionTypeSchema
} from './common.js';

// Request bodies and query strings of the REST API, snake_case as on the wire.
// Only path and query ids are coerced from strings; body ids must be JSON numbers.

export const idParamsSchema = z.object({ id: idSchema });
export const userIdParamsSchema = z.object({ userId: idSchema });

export const createUserBody = z.object({
  name: nonEmptyString.max(100),
  email: nonEmptyString.max(120)
});

export const createCategoryBody = z.object({
  name: nonEmptyString.max(50)
});

export const createTransactionBody = z.object({
  user_id: entityIdSchema,
  category_id: entityIdSchema,
  amount: amountSchema,
  description: z.string().nullish(),
  type: transactionTypeSchema,
  date: dateSchema.nullish()
});

export const updateTransactionBody = z.object({
  category_id: entityIdSchema.optional(),
  amount: amountSchema.optional(),
  description: z.string().nullable().optional(),
  type: transactionTypeSchema.optional(),
  date: dateSchema.optional()
});

export const transactionQuery = z.object({
  user_id: idSchema.optional(),
  category_id: idSchema.optional(),
  type: transactionTypeSchema.optional(),
  start_date: dateSchema.optional(),
  end_date: endDateSchema.optional()
});

export const createBudgetBody = z.object({
  user_id: entityIdSchema,
  category_id: entityIdSchema,
  amount: amountSchema,
  period: periodSchema.nullish()
});

export const updateBudgetBody = z.object({
  category_id: entityIdSchema.optional(),
  amount: amountSchema.optional(),
  period: periodSchema.optional()
});

export const budgetQuery = z.object({
  user_id: idSchema.optional()
});

export const periodQuery = z.object({
  period: periodSchema.default('monthly')
});

export const trendQuery = z.object({
  months: z.coerce.number().int().min(1).max(MAX_TREND_MONTHS).default(6)
});
