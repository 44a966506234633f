import {
  type BudgetHealth,
  type BudgetStatus,
  type CategorySpending,
  type FinancialSummary,
  type MonthlyTrendEntry
} from '../analytics/types.js';
import {
  type Budget,
  type BudgetPeriod,
  type Category,
  type EntityStore,
  type Transaction,
  type TransactionType,
  type User
} from '../store/types.js';

export interface UserJson {
  id: number
  name: string
  email: string
  created_at: string
}

export interface CategoryJson {
  id: number
  name: string
  created_at: string
}

export interface TransactionJson {
  id: number
  user_id: number
  category_id: number
  category_name: string | null
  amount: number
  description: string | null
  type: TransactionType
  date: string
  created_at: string
}

export interface BudgetJson {
  id: number
  user_id: number
  category_id: number
  category_name: string | null
  amount: number
  period: BudgetPeriod
  created_at: string
}

export interface SummaryJson {
  total_income: number
  total_expense: number
  net_balance: number
  transaction_count: number
}

export interface CategorySpendingJson {
  category_id: number
  category_name: string | null
  total_amount: number
  percentage: number
}

export interface TrendEntryJson {
  month: string
  total_income: number
  total_expense: number
  net: number
}

export interface BudgetStatusJson {
  budget_id: number
  category_id: number
  category_name: string | null
  period: BudgetPeriod
  budget_amount: number
  spent_amount: number
  remaining: number
  percentage_used: number
  status: BudgetHealth
}

export type CategoryNames = ReadonlyMap<number, string>;

/** Money and percentages are rounded here and nowhere earlier. */
export const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Looks up the names of every category the given rows reference. Ids the
 * store no longer knows are left out, so their rows serialize with a null
 * category_name.
 */
export const resolveCategoryNames = (
  store: EntityStore,
  rows: ReadonlyArray<{ categoryId: number }>
): CategoryNames => {
  const names = new Map<number, string>();
  for (const categoryId of new Set(rows.map(row => row.categoryId))) {
    const category = store.get('category', categoryId);
    if (category !== null) names.set(categoryId, category.name);
  }
  return names;
};

export const serializeUser = (user: User): UserJson => ({
  id: user.id,
  name: user.name,
  email: user.email,
  created_at: user.createdAt.toISOString()
});

export const serializeCategory = (category: Category): CategoryJson => ({
  id: category.id,
  name: category.name,
  created_at: category.createdAt.toISOString()
});

export const serializeTransaction = (txn: Transaction, names: CategoryNames): TransactionJson => ({
  id: txn.id,
  user_id: txn.userId,
  category_id: txn.categoryId,
  category_name: names.get(txn.categoryId) ?? null,
  amount: txn.amount,
  description: txn.description,
  type: txn.type,
  date: txn.date.toISOString(),
  created_at: txn.createdAt.toISOString()
});

export const serializeBudget = (budget: Budget, names: CategoryNames): BudgetJson => ({
  id: budget.id,
  user_id: budget.userId,
  category_id: budget.categoryId,
  category_name: names.get(budget.categoryId) ?? null,
  amount: budget.amount,
  period: budget.period,
  created_at: budget.createdAt.toISOString()
});

export const serializeTransactions = (store: EntityStore, txns: Transaction[]): TransactionJson[] => {
  const names = resolveCategoryNames(store, txns);
  return txns.map(txn => serializeTransaction(txn, names));
};

export const serializeBudgets = (store: EntityStore, budgets: Budget[]): BudgetJson[] => {
  const names = resolveCategoryNames(store, budgets);
  return budgets.map(budget => serializeBudget(budget, names));
};

export const serializeSummary = (summary: FinancialSummary): SummaryJson => ({
  total_income: round2(summary.totalIncome),
  total_expense: round2(summary.totalExpense),
  net_balance: round2(summary.netBalance),
  transaction_count: summary.transactionCount
});

export const serializeCategorySpending = (entry: CategorySpending): CategorySpendingJson => ({
  category_id: entry.categoryId,
  category_name: entry.categoryName,
  total_amount: round2(entry.totalAmount),
  percentage: round2(entry.percentage)
});

export const serializeTrendEntry = (entry: MonthlyTrendEntry): TrendEntryJson => ({
  month: entry.month,
  total_income: round2(entry.totalIncome),
  total_expense: round2(entry.totalExpense),
  net: round2(entry.net)
});

export const serializeBudgetStatus = (entry: BudgetStatus): BudgetStatusJson => ({
  budget_id: entry.budgetId,
  category_id: entry.categoryId,
  category_name: entry.categoryName,
  period: entry.period,
  budget_amount: round2(entry.budgetAmount),
  spent_amount: round2(entry.spentAmount),
  remaining: round2(entry.remaining),
  percentage_used: round2(entry.percentageUsed),
  status: entry.status
});
