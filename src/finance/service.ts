import { IntegrityError, NotFoundError, ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import {
  BUDGET_PERIODS,
  TRANSACTION_TYPES,
  isBudgetPeriod,
  isTransactionType,
  type Budget,
  type BudgetPeriod,
  type Category,
  type EntityStore,
  type NewBudget,
  type NewTransaction,
  type Transaction,
  type TransactionFilter,
  type TransactionType,
  type User
} from '../store/types.js';
import { DEFAULT_CATEGORIES } from './defaults.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface CreateTransactionInput {
  userId: number
  categoryId: number
  amount: number
  description?: string | null
  type: string
  date?: Date | null
}

export interface UpdateTransactionInput {
  categoryId?: number
  amount?: number
  description?: string | null
  type?: string
  date?: Date
}

export interface TransactionQuery {
  userId?: number
  categoryId?: number
  type?: string
  startDate?: Date
  endDate?: Date
}

export interface CreateBudgetInput {
  userId: number
  categoryId: number
  amount: number
  period?: string | null
}

export interface UpdateBudgetInput {
  categoryId?: number
  amount?: number
  period?: string
}

const requireText = (value: string, field: string): string => {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new ValidationError(`${field} is required`);
  }
  return trimmed;
};

const requireAmount = (amount: number): number => {
  if (!Number.isFinite(amount)) {
    throw new ValidationError('Amount must be a finite number');
  }
  if (amount < 0) {
    throw new ValidationError('Amount must not be negative');
  }
  return amount;
};

const requireTransactionType = (type: string): TransactionType => {
  if (!isTransactionType(type)) {
    throw new ValidationError(`Transaction type must be one of: ${TRANSACTION_TYPES.join(', ')}`);
  }
  return type;
};

const requirePeriod = (period: string): BudgetPeriod => {
  if (!isBudgetPeriod(period)) {
    throw new ValidationError(`Budget period must be one of: ${BUDGET_PERIODS.join(', ')}`);
  }
  return period;
};

const requireValidDate = (date: Date, field: string): Date => {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} is not a valid date`);
  }
  return date;
};

/**
 * Validated CRUD over users, categories, transactions and budgets.
 */
export class FinanceService {
  constructor (
    private readonly store: EntityStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  // Users

  createUser (input: { name: string, email: string }): User {
    const name = requireText(input.name, 'Name');
    const email = requireText(input.email, 'Email');
    if (!EMAIL_PATTERN.test(email)) {
      throw new ValidationError(`Email "${email}" is not a valid address`);
    }
    if (this.store.find('user', { email }).length > 0) {
      throw new ValidationError(`A user with email ${email} already exists`);
    }
    const user = this.store.insert('user', { name, email });
    logger.info('User created', { userId: user.id });
    return user;
  }

  getUsers (): User[] {
    return this.store.find('user');
  }

  getUser (id: number): User {
    const user = this.store.get('user', id);
    if (user === null) throw NotFoundError.forEntity('User', id);
    return user;
  }

  deleteUser (id: number): void {
    if (!this.store.delete('user', id)) {
      throw NotFoundError.forEntity('User', id);
    }
    logger.info('User deleted', { userId: id });
  }

  // Categories

  createCategory (input: { name: string }): Category {
    const name = requireText(input.name, 'Category name');
    if (this.store.find('category', { name }).length > 0) {
      throw new ValidationError(`Category "${name}" already exists`);
    }
    return this.store.insert('category', { name });
  }

  getCategories (): Category[] {
    return this.store.find('category');
  }

  getCategory (id: number): Category {
    const category = this.store.get('category', id);
    if (category === null) throw NotFoundError.forEntity('Category', id);
    return category;
  }

  deleteCategory (id: number): void {
    this.getCategory(id);
    const inUse = this.store.find('transaction', { categoryId: id }).length > 0 ||
      this.store.find('budget', { categoryId: id }).length > 0;
    if (inUse) {
      throw new IntegrityError(`Category ${id} is still referenced by transactions or budgets`);
    }
    this.store.delete('category', id);
    logger.info('Category deleted', { categoryId: id });
  }

  /**
   * Inserts the default taxonomy, skipping names that already exist. Returns
   * the names that were added.
   */
  seedDefaultCategories (names: readonly string[] = DEFAULT_CATEGORIES): string[] {
    const added: string[] = [];
    for (const name of names) {
      if (this.store.find('category', { name }).length === 0) {
        this.store.insert('category', { name });
        added.push(name);
      }
    }
    if (added.length > 0) {
      logger.info('Seeded default categories', { count: added.length });
    }
    return added;
  }

  // Transactions

  createTransaction (input: CreateTransactionInput): Transaction {
    const values: NewTransaction = {
      userId: input.userId,
      categoryId: input.categoryId,
      amount: requireAmount(input.amount),
      description: input.description ?? null,
      type: requireTransactionType(input.type),
      date: requireValidDate(input.date ?? this.clock(), 'Date')
    };
    this.getUser(values.userId);
    this.getCategory(values.categoryId);

    const transaction = this.store.insert('transaction', values);
    logger.debug('Transaction created', { transactionId: transaction.id, userId: transaction.userId });
    return transaction;
  }

  getTransaction (id: number): Transaction {
    const transaction = this.store.get('transaction', id);
    if (transaction === null) throw NotFoundError.forEntity('Transaction', id);
    return transaction;
  }

  getTransactions (query: TransactionQuery = {}): Transaction[] {
    const filter: TransactionFilter = {
      userId: query.userId,
      categoryId: query.categoryId,
      type: query.type === undefined ? undefined : requireTransactionType(query.type),
      startDate: query.startDate === undefined ? undefined : requireValidDate(query.startDate, 'Start date'),
      endDate: query.endDate === undefined ? undefined : requireValidDate(query.endDate, 'End date')
    };
    if (filter.startDate !== undefined && filter.endDate !== undefined && filter.startDate > filter.endDate) {
      throw new ValidationError('Start date must not be after end date');
    }
    return this.store.find('transaction', filter);
  }

  updateTransaction (id: number, changes: UpdateTransactionInput): Transaction {
    this.getTransaction(id);

    const values: Partial<NewTransaction> = {};
    if (changes.categoryId !== undefined) {
      values.categoryId = this.getCategory(changes.categoryId).id;
    }
    if (changes.amount !== undefined) values.amount = requireAmount(changes.amount);
    if (changes.description !== undefined) values.description = changes.description;
    if (changes.type !== undefined) values.type = requireTransactionType(changes.type);
    if (changes.date !== undefined) values.date = requireValidDate(changes.date, 'Date');

    const updated = this.store.update('transaction', id, values);
    if (updated === null) throw NotFoundError.forEntity('Transaction', id);
    return updated;
  }

  deleteTransaction (id: number): void {
    if (!this.store.delete('transaction', id)) {
      throw NotFoundError.forEntity('Transaction', id);
    }
  }

  // Budgets

  createBudget (input: CreateBudgetInput): Budget {
    const values: NewBudget = {
      userId: input.userId,
      categoryId: input.categoryId,
      amount: requireAmount(input.amount),
      period: requirePeriod(input.period ?? 'monthly')
    };
    this.getUser(values.userId);
    this.getCategory(values.categoryId);

    const budget = this.store.insert('budget', values);
    logger.debug('Budget created', { budgetId: budget.id, userId: budget.userId });
    return budget;
  }

  /** Without a user id every budget is returned. */
  getBudgets (userId?: number): Budget[] {
    return this.store.find('budget', { userId });
  }

  getBudget (id: number): Budget {
    const budget = this.store.get('budget', id);
    if (budget === null) throw NotFoundError.forEntity('Budget', id);
    return budget;
  }

  updateBudget (id: number, changes: UpdateBudgetInput): Budget {
    this.getBudget(id);

    const values: Partial<NewBudget> = {};
    if (changes.categoryId !== undefined) {
      values.categoryId = this.getCategory(changes.categoryId).id;
    }
    if (changes.amount !== undefined) values.amount = requireAmount(changes.amount);
    if (changes.period !== undefined) values.period = requirePeriod(changes.period);

    const updated = this.store.update('budget', id, values);
    if (updated === null) throw NotFoundError.forEntity('Budget', id);
    return updated;
  }

  deleteBudget (id: number): void {
    if (!this.store.delete('budget', id)) {
      throw NotFoundError.forEntity('Budget', id);
    }
  }
}
