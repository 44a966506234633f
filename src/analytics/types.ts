import { type BudgetPeriod } from '../store/types.js';

export interface FinancialSummary {
  totalIncome: number
  totalExpense: number
  netBalance: number
  transactionCount: number
}

export interface CategorySpending {
  categoryId: number
  categoryName: string | null
  totalAmount: number
  percentage: number
}

export interface MonthlyTrendEntry {
  month: string
  totalIncome: number
  totalExpense: number
  net: number
}

export type BudgetHealth = 'ok' | 'warning' | 'over';

export interface BudgetStatus {
  budgetId: number
  categoryId: number
  categoryName: string | null
  period: BudgetPeriod
  budgetAmount: number
  spentAmount: number
  remaining: number
  percentageUsed: number
  status: BudgetHealth
}

export interface AnalyticsOptions {
  /** Instant the query is anchored to; defaults to the service clock. */
  now?: Date
}
