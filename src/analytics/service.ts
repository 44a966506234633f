import { NotFoundError } from '../errors.js';
import { type Budget, type EntityStore, type Transaction } from '../store/types.js';
import { resolvePeriodWindow, trailingMonthWindows } from './periods.js';
import {
  type AnalyticsOptions,
  type BudgetHealth,
  type BudgetStatus,
  type CategorySpending,
  type FinancialSummary,
  type MonthlyTrendEntry
} from './types.js';

export const BUDGET_WARNING_PERCENT = 80;
export const BUDGET_OVER_PERCENT = 100;

export const classifyBudgetUsage = (percentageUsed: number): BudgetHealth => {
  if (percentageUsed > BUDGET_OVER_PERCENT) return 'over';
  if (percentageUsed >= BUDGET_WARNING_PERCENT) return 'warning';
  return 'ok';
};

export const summarizeTransactions = (transactions: readonly Transaction[]): FinancialSummary => {
  let totalIncome = 0;
  let totalExpense = 0;
  for (const txn of transactions) {
    if (txn.type === 'income') {
      totalIncome += txn.amount;
    } else {
      totalExpense += txn.amount;
    }
  }
  return {
    totalIncome,
    totalExpense,
    netBalance: totalIncome - totalExpense,
    transactionCount: transactions.length
  };
};

/**
 * Read-only aggregates over a user's transactions and budgets. Values are
 * returned unrounded.
 */
export class AnalyticsService {
  constructor (
    private readonly store: EntityStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  getFinancialSummary (userId: number, period: string = 'monthly', options: AnalyticsOptions = {}): FinancialSummary {
    this.requireUser(userId);
    const { start, end } = resolvePeriodWindow(period, options.now ?? this.clock());
    return summarizeTransactions(this.store.find('transaction', { userId, startDate: start, endDate: end }));
  }

  getSpendingByCategory (userId: number, period: string = 'monthly', options: AnalyticsOptions = {}): CategorySpending[] {
    this.requireUser(userId);
    const { start, end } = resolvePeriodWindow(period, options.now ?? this.clock());
    const expenses = this.store.find('transaction', { userId, type: 'expense', startDate: start, endDate: end });

    const totals = new Map<number, number>();
    for (const txn of expenses) {
      totals.set(txn.categoryId, (totals.get(txn.categoryId) ?? 0) + txn.amount);
    }
    const grandTotal = [...totals.values()].reduce((sum, total) => sum + total, 0);

    return [...totals.entries()]
      .map(([categoryId, totalAmount]) => ({
        categoryId,
        categoryName: this.store.get('category', categoryId)?.name ?? null,
        totalAmount,
        percentage: grandTotal > 0 ? (totalAmount / grandTotal) * 100 : 0
      }))
      .sort((a, b) => b.totalAmount - a.totalAmount || (a.categoryName ?? '').localeCompare(b.categoryName ?? ''));
  }

  getMonthlyTrend (userId: number, months: number = 6, options: AnalyticsOptions = {}): MonthlyTrendEntry[] {
    this.requireUser(userId);
    return trailingMonthWindows(months, options.now ?? this.clock()).map(window => {
      const summary = summarizeTransactions(
        this.store.find('transaction', { userId, startDate: window.start, before: window.end })
      );
      return {
        month: window.label,
        totalIncome: summary.totalIncome,
        totalExpense: summary.totalExpense,
        net: summary.netBalance
      };
    });
  }

  getBudgetStatus (userId: number, options: AnalyticsOptions = {}): BudgetStatus[] {
    this.requireUser(userId);
    const now = options.now ?? this.clock();
    return this.store.find('budget', { userId }).map(budget => this.statusFor(budget, now));
  }

  private statusFor (budget: Budget, now: Date): BudgetStatus {
    const { start, end } = resolvePeriodWindow(budget.period, now);
    const spentAmount = this.store
      .find('transaction', { userId: budget.userId, categoryId: budget.categoryId, type: 'expense', startDate: start, endDate: end })
      .reduce((sum, txn) => sum + txn.amount, 0);
    const percentageUsed = budget.amount > 0 ? (spentAmount / budget.amount) * 100 : 0;

    return {
      budgetId: budget.id,
      categoryId: budget.categoryId,
      categoryName: this.store.get('category', budget.categoryId)?.name ?? null,
      period: budget.period,
      budgetAmount: budget.amount,
      spentAmount,
      remaining: budget.amount - spentAmount,
      percentageUsed,
      status: classifyBudgetUsage(percentageUsed)
    };
  }

  private requireUser (userId: number): void {
    if (this.store.get('user', userId) === null) {
      throw NotFoundError.forEntity('User', userId);
    }
  }
}
