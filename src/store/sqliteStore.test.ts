import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IntegrityError } from '../errors.js';
import { SqliteStore } from './sqliteStore.js';

describe('SqliteStore', () => {
  let store: SqliteStore;

  beforeEach(() => {
    store = new SqliteStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  const seed = (): { userId: number, categoryId: number } => {
    const user = store.insert('user', { name: 'Alice', email: 'a@x.com' });
    const category = store.insert('category', { name: 'Food' });
    return { userId: user.id, categoryId: category.id };
  };

  it('inserts and reads back entities with generated ids and timestamps', () => {
    const user = store.insert('user', { name: 'Alice', email: 'a@x.com' });

    expect(user.id).toBe(1);
    expect(user.name).toBe('Alice');
    expect(user.createdAt).toBeInstanceOf(Date);
    expect(store.get('user', 1)).toEqual(user);
    expect(store.get('user', 2)).toBeNull();
  });

  it('stores transaction dates and nullable descriptions', () => {
    const { userId, categoryId } = seed();
    const date = new Date('2024-03-05T10:30:00.000Z');
    const txn = store.insert('transaction', { userId, categoryId, amount: 12.5, description: null, type: 'expense', date });

    expect(txn).toMatchObject({ userId, categoryId, amount: 12.5, description: null, type: 'expense' });
    expect(txn.date.toISOString()).toBe('2024-03-05T10:30:00.000Z');
  });

  it('filters transactions and orders them newest first', () => {
    const { userId, categoryId } = seed();
    const other = store.insert('category', { name: 'Travel' });
    const add = (amount: number, type: 'income' | 'expense', iso: string, catId = categoryId): number =>
      store.insert('transaction', { userId, categoryId: catId, amount, description: null, type, date: new Date(iso) }).id;

    const jan = add(10, 'expense', '2024-01-10T00:00:00.000Z');
    const feb = add(20, 'expense', '2024-02-10T00:00:00.000Z');
    add(30, 'income', '2024-02-11T00:00:00.000Z');
    const mar = add(40, 'expense', '2024-03-10T00:00:00.000Z', other.id);

    expect(store.find('transaction', { type: 'expense' }).map(t => t.id)).toEqual([mar, feb, jan]);
    expect(store.find('transaction', { categoryId, type: 'expense' }).map(t => t.id)).toEqual([feb, jan]);
    expect(store.find('transaction', {
      startDate: new Date('2024-01-10T00:00:00.000Z'),
      endDate: new Date('2024-02-10T00:00:00.000Z')
    }).map(t => t.id)).toEqual([feb, jan]);
    expect(store.find('transaction', { before: new Date('2024-02-10T00:00:00.000Z') }).map(t => t.id)).toEqual([jan]);
  });

  it('applies partial updates and keeps untouched columns', () => {
    const { userId, categoryId } = seed();
    const txn = store.insert('transaction', {
      userId, categoryId, amount: 5, description: 'coffee', type: 'expense', date: new Date('2024-01-01T00:00:00.000Z')
    });

    const updated = store.update('transaction', txn.id, { amount: 7 });
    expect(updated).toMatchObject({ amount: 7, description: 'coffee', type: 'expense' });

    const cleared = store.update('transaction', txn.id, { description: null });
    expect(cleared?.description).toBeNull();
    expect(cleared?.amount).toBe(7);
  });

  it('returns null when updating a missing row and false when deleting one', () => {
    expect(store.update('budget', 99, { amount: 1 })).toBeNull();
    expect(store.delete('budget', 99)).toBe(false);
  });

  it('cascades user deletion to transactions and budgets', () => {
    const { userId, categoryId } = seed();
    store.insert('transaction', { userId, categoryId, amount: 5, description: null, type: 'expense', date: new Date() });
    store.insert('budget', { userId, categoryId, amount: 100, period: 'monthly' });

    expect(store.delete('user', userId)).toBe(true);
    expect(store.find('transaction')).toEqual([]);
    expect(store.find('budget')).toEqual([]);
    expect(store.find('category')).toHaveLength(1);
  });

  it('refuses to delete a category that is still referenced', () => {
    const { userId, categoryId } = seed();
    store.insert('budget', { userId, categoryId, amount: 100, period: 'weekly' });

    expect(() => store.delete('category', categoryId)).toThrow(IntegrityError);
    expect(store.get('category', categoryId)).not.toBeNull();
  });

  it('reports constraint violations as IntegrityError', () => {
    const { userId, categoryId } = seed();

    expect(() => store.insert('user', { name: 'Other', email: 'a@x.com' })).toThrow(IntegrityError);
    expect(() => store.insert('category', { name: 'Food' })).toThrow(IntegrityError);
    expect(() => store.insert('transaction', {
      userId: 42, categoryId, amount: 1, description: null, type: 'income', date: new Date()
    })).toThrow(IntegrityError);
    expect(() => store.insert('budget', { userId, categoryId, amount: -1, period: 'monthly' })).toThrow(IntegrityError);
  });
});
