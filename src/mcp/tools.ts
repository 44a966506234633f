import * as z from 'zod/v4';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { MAX_TREND_MONTHS } from '../analytics/periods.js';
import {
  resolveCategoryNames,
  serializeBudget,
  serializeBudgets,
  serializeBudgetStatus,
  serializeCategory,
  serializeCategorySpending,
  serializeSummary,
  serializeTransaction,
  serializeTransactions,
  serializeTrendEntry,
  serializeUser
} from '../api/serialize.js';
import { isFinanceError } from '../errors.js';
import { logger } from '../logger.js';
import { type Services } from '../services.js';
import {
  amountSchema,
  entityIdSchema,
  isoDateString,
  nonEmptyString,
  periodSchema,
  toDate,
  toEndDate,
  transactionTypeSchema
} from '../schemas/common.js';

const jsonResult = (value: unknown): CallToolResult => ({
  content: [{ type: 'text', text: JSON.stringify(value, null, 2) }]
});

const textResult = (text: string): CallToolResult => ({
  content: [{ type: 'text', text }]
});

/**
 * Runs a tool body and reports finance errors back to the model as tool
 * errors. Anything else propagates to the SDK.
 */
const runTool = (tool: string, body: () => CallToolResult): CallToolResult => {
  try {
    return body();
  } catch (error) {
    if (isFinanceError(error)) {
      logger.warn('Tool call rejected', { tool, error: error.name, message: error.message });
      return { content: [{ type: 'text', text: error.message }], isError: true };
    }
    throw error;
  }
};

export const registerTools = (server: McpServer, { store, finance, analytics }: Services): void => {
  // Users
  server.registerTool(
    'create-user',
    {
      title: 'Create User',
      description: 'Create a user with a unique email address',
      inputSchema: {
        name: nonEmptyString.max(100),
        email: nonEmptyString.max(120)
      }
    },
    async args => runTool('create-user', () => jsonResult(serializeUser(finance.createUser(args))))
  );

  server.registerTool(
    'get-users',
    { title: 'Get Users', description: 'List all users' },
    async () => runTool('get-users', () => jsonResult(finance.getUsers().map(serializeUser)))
  );

  server.registerTool(
    'delete-user',
    {
      title: 'Delete User',
      description: 'Delete a user together with their transactions and budgets',
      inputSchema: { userId: entityIdSchema }
    },
    async ({ userId }) => runTool('delete-user', () => {
      finance.deleteUser(userId);
      return textResult(`Deleted user ${userId}`);
    })
  );

  // Categories
  server.registerTool(
    'get-categories',
    { title: 'Get Categories', description: 'List all categories' },
    async () => runTool('get-categories', () => jsonResult(finance.getCategories().map(serializeCategory)))
  );

  server.registerTool(
    'create-category',
    {
      title: 'Create Category',
      description: 'Create a category; names are unique',
      inputSchema: { name: nonEmptyString.max(50) }
    },
    async args => runTool('create-category', () => jsonResult(serializeCategory(finance.createCategory(args))))
  );

  server.registerTool(
    'delete-category',
    {
      title: 'Delete Category',
      description: 'Delete a category that no transaction or budget references',
      inputSchema: { categoryId: entityIdSchema }
    },
    async ({ categoryId }) => runTool('delete-category', () => {
      finance.deleteCategory(categoryId);
      return textResult(`Deleted category ${categoryId}`);
    })
  );

  // Transactions
  server.registerTool(
    'get-transactions',
    {
      title: 'Get Transactions',
      description: 'Retrieve transactions with optional filters, newest first',
      inputSchema: {
        userId: entityIdSchema.nullish().describe('User ID to filter'),
        categoryId: entityIdSchema.nullish().describe('Category ID to filter'),
        type: transactionTypeSchema.nullish().describe('income or expense'),
        startDate: isoDateString.nullish().describe('Inclusive start, ISO date or date-time'),
        endDate: isoDateString.nullish().describe('Inclusive end; a bare date covers the whole day')
      }
    },
    async args => runTool('get-transactions', () => {
      const txns = finance.getTransactions({
        userId: args.userId ?? undefined,
        categoryId: args.categoryId ?? undefined,
        type: args.type ?? undefined,
        startDate: args.startDate == null ? undefined : toDate(args.startDate),
        endDate: args.endDate == null ? undefined : toEndDate(args.endDate)
      });
      return jsonResult(serializeTransactions(store, txns));
    })
  );

  server.registerTool(
    'add-transaction',
    {
      title: 'Add Transaction',
      description: 'Record an income or expense',
      inputSchema: {
        userId: entityIdSchema,
        categoryId: entityIdSchema,
        amount: amountSchema.describe('Non-negative amount; the sign is carried by type'),
        type: transactionTypeSchema,
        description: z.string().nullish(),
        date: isoDateString.nullish().describe('Defaults to now')
      }
    },
    async args => runTool('add-transaction', () => {
      const txn = finance.createTransaction({
        userId: args.userId,
        categoryId: args.categoryId,
        amount: args.amount,
        type: args.type,
        description: args.description ?? null,
        date: args.date == null ? undefined : toDate(args.date)
      });
      return jsonResult(serializeTransaction(txn, resolveCategoryNames(store, [txn])));
    })
  );

  server.registerTool(
    'update-transaction',
    {
      title: 'Update Transaction',
      description: 'Change the given fields of a transaction',
      inputSchema: {
        transactionId: entityIdSchema,
        categoryId: entityIdSchema.nullish(),
        amount: amountSchema.nullish(),
        type: transactionTypeSchema.nullish(),
        description: z.string().nullish().describe('null clears the description'),
        date: isoDateString.nullish()
      }
    },
    async ({ transactionId, ...updated }) => runTool('update-transaction', () => {
      const txn = finance.updateTransaction(transactionId, {
        categoryId: updated.categoryId ?? undefined,
        amount: updated.amount ?? undefined,
        type: updated.type ?? undefined,
        description: updated.description,
        date: updated.date == null ? undefined : toDate(updated.date)
      });
      return jsonResult(serializeTransaction(txn, resolveCategoryNames(store, [txn])));
    })
  );

  server.registerTool(
    'delete-transaction',
    {
      title: 'Delete Transaction',
      description: 'Remove a transaction',
      inputSchema: { transactionId: entityIdSchema }
    },
    async ({ transactionId }) => runTool('delete-transaction', () => {
      finance.deleteTransaction(transactionId);
      return textResult(`Deleted transaction ${transactionId}`);
    })
  );

  // Budgets
  server.registerTool(
    'get-budgets',
    {
      title: 'Get Budgets',
      description: 'List budgets, optionally for one user',
      inputSchema: { userId: entityIdSchema.nullish() }
    },
    async ({ userId }) => runTool('get-budgets', () =>
      jsonResult(serializeBudgets(store, finance.getBudgets(userId ?? undefined))))
  );

  server.registerTool(
    'create-budget',
    {
      title: 'Create Budget',
      description: 'Set a spending limit for a category',
      inputSchema: {
        userId: entityIdSchema,
        categoryId: entityIdSchema,
        amount: amountSchema,
        period: periodSchema.nullish().describe('weekly, monthly or yearly; defaults to monthly')
      }
    },
    async args => runTool('create-budget', () => {
      const budget = finance.createBudget(args);
      return jsonResult(serializeBudget(budget, resolveCategoryNames(store, [budget])));
    })
  );

  server.registerTool(
    'update-budget',
    {
      title: 'Update Budget',
      description: 'Change the given fields of a budget',
      inputSchema: {
        budgetId: entityIdSchema,
        categoryId: entityIdSchema.nullish(),
        amount: amountSchema.nullish(),
        period: periodSchema.nullish()
      }
    },
    async ({ budgetId, ...updated }) => runTool('update-budget', () => {
      const budget = finance.updateBudget(budgetId, {
        categoryId: updated.categoryId ?? undefined,
        amount: updated.amount ?? undefined,
        period: updated.period ?? undefined
      });
      return jsonResult(serializeBudget(budget, resolveCategoryNames(store, [budget])));
    })
  );

  server.registerTool(
    'delete-budget',
    {
      title: 'Delete Budget',
      description: 'Remove a budget',
      inputSchema: { budgetId: entityIdSchema }
    },
    async ({ budgetId }) => runTool('delete-budget', () => {
      finance.deleteBudget(budgetId);
      return textResult(`Deleted budget ${budgetId}`);
    })
  );

  // Analytics
  server.registerTool(
    'get-financial-summary',
    {
      title: 'Financial Summary',
      description: 'Income, expense and net balance over a rolling period',
      inputSchema: {
        userId: entityIdSchema,
        period: periodSchema.default('monthly')
      }
    },
    async ({ userId, period }) => runTool('get-financial-summary', () =>
      jsonResult(serializeSummary(analytics.getFinancialSummary(userId, period))))
  );

  server.registerTool(
    'get-spending-by-category',
    {
      title: 'Spending By Category',
      description: 'Expense totals and shares per category over a rolling period',
      inputSchema: {
        userId: entityIdSchema,
        period: periodSchema.default('monthly')
      }
    },
    async ({ userId, period }) => runTool('get-spending-by-category', () =>
      jsonResult(analytics.getSpendingByCategory(userId, period).map(serializeCategorySpending)))
  );

  server.registerTool(
    'get-monthly-trend',
    {
      title: 'Monthly Trend',
      description: 'Income and expense per calendar month, oldest first',
      inputSchema: {
        userId: entityIdSchema,
        months: z.number().int().min(1).max(MAX_TREND_MONTHS).default(6)
      }
    },
    async ({ userId, months }) => runTool('get-monthly-trend', () =>
      jsonResult(analytics.getMonthlyTrend(userId, months).map(serializeTrendEntry)))
  );

  server.registerTool(
    'get-budget-status',
    {
      title: 'Budget Status',
      description: 'Spend against each budget of a user with ok/warning/over status',
      inputSchema: { userId: entityIdSchema }
    },
    async ({ userId }) => runTool('get-budget-status', () =>
      jsonResult(analytics.getBudgetStatus(userId).map(serializeBudgetStatus)))
  );
};
