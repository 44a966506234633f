import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IntegrityError, NotFoundError, ValidationError } from '../errors.js';
import { SqliteStore } from '../store/sqliteStore.js';
import { DEFAULT_CATEGORIES } from './defaults.js';
import { FinanceService } from './service.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');

describe('FinanceService', () => {
  let store: SqliteStore;
  let finance: FinanceService;

  beforeEach(() => {
    store = new SqliteStore(':memory:');
    finance = new FinanceService(store, () => NOW);
  });

  afterEach(() => {
    store.close();
  });

  describe('users', () => {
    it('creates a user with trimmed fields', () => {
      const user = finance.createUser({ name: '  Alice ', email: ' a@x.com ' });
      expect(user).toMatchObject({ id: 1, name: 'Alice', email: 'a@x.com' });
      expect(finance.getUsers()).toEqual([user]);
    });

    it('rejects empty fields, malformed and duplicate emails', () => {
      finance.createUser({ name: 'Alice', email: 'a@x.com' });

      expect(() => finance.createUser({ name: ' ', email: 'b@x.com' })).toThrow(new ValidationError('Name is required'));
      expect(() => finance.createUser({ name: 'Bob', email: '' })).toThrow(new ValidationError('Email is required'));
      expect(() => finance.createUser({ name: 'Bob', email: 'bob' })).toThrow(new ValidationError('Email "bob" is not a valid address'));
      expect(() => finance.createUser({ name: 'Bob', email: 'a@x.com' }))
        .toThrow(new ValidationError('A user with email a@x.com already exists'));
    });

    it('raises NotFoundError for unknown users', () => {
      expect(() => finance.getUser(7)).toThrow(new NotFoundError('User 7 not found'));
      expect(() => finance.deleteUser(7)).toThrow(NotFoundError);
    });

    it('deletes a user together with their transactions and budgets', () => {
      const alice = finance.createUser({ name: 'Alice', email: 'a@x.com' });
      const bob = finance.createUser({ name: 'Bob', email: 'b@x.com' });
      const food = finance.createCategory({ name: 'Food' });
      finance.createTransaction({ userId: alice.id, categoryId: food.id, amount: 10, type: 'expense' });
      finance.createTransaction({ userId: bob.id, categoryId: food.id, amount: 20, type: 'expense' });
      finance.createBudget({ userId: alice.id, categoryId: food.id, amount: 100 });

      finance.deleteUser(alice.id);

      expect(finance.getTransactions().map(t => t.userId)).toEqual([bob.id]);
      expect(finance.getBudgets()).toEqual([]);
    });
  });

  describe('categories', () => {
    it('rejects duplicate and empty names', () => {
      finance.createCategory({ name: 'Food' });
      expect(() => finance.createCategory({ name: 'Food' })).toThrow(new ValidationError('Category "Food" already exists'));
      expect(() => finance.createCategory({ name: '' })).toThrow(new ValidationError('Category name is required'));
    });

    it('deletes unused categories and refuses referenced ones', () => {
      const user = finance.createUser({ name: 'Alice', email: 'a@x.com' });
      const food = finance.createCategory({ name: 'Food' });
      const spare = finance.createCategory({ name: 'Spare' });
      finance.createTransaction({ userId: user.id, categoryId: food.id, amount: 1, type: 'expense' });

      finance.deleteCategory(spare.id);
      expect(finance.getCategories().map(c => c.name)).toEqual(['Food']);

      expect(() => finance.deleteCategory(food.id))
        .toThrow(new IntegrityError(`Category ${food.id} is still referenced by transactions or budgets`));
      expect(() => finance.deleteCategory(99)).toThrow(NotFoundError);
    });

    it('seeds the default categories once', () => {
      finance.createCategory({ name: 'Travel' });

      const added = finance.seedDefaultCategories();
      expect(added).toHaveLength(DEFAULT_CATEGORIES.length - 1);
      expect(added).not.toContain('Travel');
      expect(finance.seedDefaultCategories()).toEqual([]);
      expect(finance.getCategories()).toHaveLength(DEFAULT_CATEGORIES.length);
    });
  });

  describe('transactions', () => {
    let userId: number;
    let foodId: number;
    let travelId: number;

    beforeEach(() => {
      userId = finance.createUser({ name: 'Alice', email: 'a@x.com' }).id;
      foodId = finance.createCategory({ name: 'Food' }).id;
      travelId = finance.createCategory({ name: 'Travel' }).id;
    });

    it('defaults the date to the current instant and the description to null', () => {
      const txn = finance.createTransaction({ userId, categoryId: foodId, amount: 50, type: 'expense' });
      expect(txn.date).toEqual(NOW);
      expect(txn.description).toBeNull();
    });

    it('validates references, type and amount', () => {
      expect(() => finance.createTransaction({ userId: 99, categoryId: foodId, amount: 1, type: 'expense' }))
        .toThrow(new NotFoundError('User 99 not found'));
      expect(() => finance.createTransaction({ userId, categoryId: 99, amount: 1, type: 'expense' }))
        .toThrow(new NotFoundError('Category 99 not found'));
      expect(() => finance.createTransaction({ userId, categoryId: foodId, amount: 1, type: 'transfer' }))
        .toThrow(new ValidationError('Transaction type must be one of: income, expense'));
      expect(() => finance.createTransaction({ userId, categoryId: foodId, amount: -5, type: 'income' }))
        .toThrow(new ValidationError('Amount must not be negative'));
      expect(() => finance.createTransaction({ userId, categoryId: foodId, amount: Number.NaN, type: 'income' }))
        .toThrow(new ValidationError('Amount must be a finite number'));
      expect(() => finance.createTransaction({ userId, categoryId: foodId, amount: 1, type: 'income', date: new Date('nope') }))
        .toThrow(new ValidationError('Date is not a valid date'));
    });

    it('combines independent filters', () => {
      const a = finance.createTransaction({ userId, categoryId: foodId, amount: 10, type: 'expense', date: new Date('2024-01-05T00:00:00.000Z') });
      const b = finance.createTransaction({ userId, categoryId: foodId, amount: 20, type: 'income', date: new Date('2024-02-05T00:00:00.000Z') });
      const c = finance.createTransaction({ userId, categoryId: travelId, amount: 30, type: 'expense', date: new Date('2024-03-05T00:00:00.000Z') });

      expect(finance.getTransactions().map(t => t.id)).toEqual([c.id, b.id, a.id]);
      expect(finance.getTransactions({ categoryId: foodId }).map(t => t.id)).toEqual([b.id, a.id]);
      expect(finance.getTransactions({ type: 'expense' }).map(t => t.id)).toEqual([c.id, a.id]);
      expect(finance.getTransactions({
        userId,
        type: 'expense',
        startDate: new Date('2024-02-01T00:00:00.000Z'),
        endDate: new Date('2024-03-05T00:00:00.000Z')
      }).map(t => t.id)).toEqual([c.id]);
    });

    it('rejects an inverted date range', () => {
      expect(() => finance.getTransactions({
        startDate: new Date('2024-02-01T00:00:00.000Z'),
        endDate: new Date('2024-01-01T00:00:00.000Z')
      })).toThrow(new ValidationError('Start date must not be after end date'));
    });

    it('updates only the supplied fields', () => {
      const txn = finance.createTransaction({ userId, categoryId: foodId, amount: 10, type: 'expense', description: 'lunch' });

      const updated = finance.updateTransaction(txn.id, { amount: 12, categoryId: travelId });
      expect(updated).toMatchObject({ amount: 12, categoryId: travelId, description: 'lunch', type: 'expense' });
      expect(updated.date).toEqual(NOW);

      expect(() => finance.updateTransaction(txn.id, { categoryId: 99 })).toThrow(new NotFoundError('Category 99 not found'));
      expect(() => finance.updateTransaction(txn.id, { type: 'refund' })).toThrow(ValidationError);
      expect(() => finance.updateTransaction(404, { amount: 1 })).toThrow(new NotFoundError('Transaction 404 not found'));
    });

    it('hard deletes transactions', () => {
      const txn = finance.createTransaction({ userId, categoryId: foodId, amount: 10, type: 'expense' });
      finance.deleteTransaction(txn.id);
      expect(() => finance.getTransaction(txn.id)).toThrow(NotFoundError);
      expect(() => finance.deleteTransaction(txn.id)).toThrow(NotFoundError);
    });
  });

  describe('budgets', () => {
    let aliceId: number;
    let bobId: number;
    let foodId: number;

    beforeEach(() => {
      aliceId = finance.createUser({ name: 'Alice', email: 'a@x.com' }).id;
      bobId = finance.createUser({ name: 'Bob', email: 'b@x.com' }).id;
      foodId = finance.createCategory({ name: 'Food' }).id;
    });

    it('defaults the period to monthly and validates input', () => {
      expect(finance.createBudget({ userId: aliceId, categoryId: foodId, amount: 100 }).period).toBe('monthly');
      expect(() => finance.createBudget({ userId: aliceId, categoryId: foodId, amount: 100, period: 'daily' }))
        .toThrow(new ValidationError('Budget period must be one of: weekly, monthly, yearly'));
      expect(() => finance.createBudget({ userId: 99, categoryId: foodId, amount: 100 })).toThrow(NotFoundError);
      expect(() => finance.createBudget({ userId: aliceId, categoryId: foodId, amount: -1 })).toThrow(ValidationError);
    });

    it('lists every budget without a user id and one user\'s budgets with it', () => {
      const a = finance.createBudget({ userId: aliceId, categoryId: foodId, amount: 100 });
      const b = finance.createBudget({ userId: bobId, categoryId: foodId, amount: 50, period: 'weekly' });

      expect(finance.getBudgets().map(x => x.id)).toEqual([a.id, b.id]);
      expect(finance.getBudgets(bobId).map(x => x.id)).toEqual([b.id]);
      expect(finance.getBudgets(999)).toEqual([]);
    });

    it('updates and deletes budgets', () => {
      const budget = finance.createBudget({ userId: aliceId, categoryId: foodId, amount: 100 });

      expect(finance.updateBudget(budget.id, { period: 'yearly' })).toMatchObject({ amount: 100, period: 'yearly' });
      expect(() => finance.updateBudget(budget.id, { period: 'hourly' })).toThrow(ValidationError);

      finance.deleteBudget(budget.id);
      expect(() => finance.getBudget(budget.id)).toThrow(new NotFoundError(`Budget ${budget.id} not found`));
      expect(() => finance.deleteBudget(budget.id)).toThrow(NotFoundError);
    });
  });
});
