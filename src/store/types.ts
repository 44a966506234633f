export const TRANSACTION_TYPES = ['income', 'expense'] as const;
export type TransactionType = typeof TRANSACTION_TYPES[number];

export const BUDGET_PERIODS = ['weekly', 'monthly', 'yearly'] as const;
export type BudgetPeriod = typeof BUDGET_PERIODS[number];

export const isTransactionType = (value: string): value is TransactionType =>
  TRANSACTION_TYPES.some(type => type === value);

export const isBudgetPeriod = (value: string): value is BudgetPeriod =>
  BUDGET_PERIODS.some(period => period === value);

export interface User {
  id: number
  name: string
  email: string
  createdAt: Date
}

export interface Category {
  id: number
  name: string
  createdAt: Date
}

export interface Transaction {
  id: number
  userId: number
  categoryId: number
  amount: number
  description: string | null
  type: TransactionType
  date: Date
  createdAt: Date
}

export interface Budget {
  id: number
  userId: number
  categoryId: number
  amount: number
  period: BudgetPeriod
  createdAt: Date
}

export type NewUser = Pick<User, 'name' | 'email'>;
export type NewCategory = Pick<Category, 'name'>;
export type NewTransaction = Omit<Transaction, 'id' | 'createdAt'>;
export type NewBudget = Omit<Budget, 'id' | 'createdAt'>;

export interface UserFilter {
  email?: string
}

export interface CategoryFilter {
  name?: string
}

export interface TransactionFilter {
  userId?: number
  categoryId?: number
  type?: TransactionType
  /** Inclusive lower bound on `date`. */
  startDate?: Date
  /** Inclusive upper bound on `date`. */
  endDate?: Date
  /** Exclusive upper bound on `date`. */
  before?: Date
}

export interface BudgetFilter {
  userId?: number
  categoryId?: number
}

export interface EntityMap {
  user: User
  category: Category
  transaction: Transaction
  budget: Budget
}

export interface NewEntityMap {
  user: NewUser
  category: NewCategory
  transaction: NewTransaction
  budget: NewBudget
}

export interface FilterMap {
  user: UserFilter
  category: CategoryFilter
  transaction: TransactionFilter
  budget: BudgetFilter
}

export type EntityKind = keyof EntityMap;

/**
 * Persistence handle threaded through every service. Implementations enforce
 * referential integrity and raise IntegrityError on constraint violations.
 */
export interface EntityStore {
  get: <K extends EntityKind>(kind: K, id: number) => EntityMap[K] | null
  find: <K extends EntityKind>(kind: K, filter?: FilterMap[K]) => Array<EntityMap[K]>
  insert: <K extends EntityKind>(kind: K, values: NewEntityMap[K]) => EntityMap[K]
  update: <K extends EntityKind>(kind: K, id: number, changes: Partial<NewEntityMap[K]>) => EntityMap[K] | null
  delete: (kind: EntityKind, id: number) => boolean
  close: () => void
}
