import Database from 'better-sqlite3';
import * as z from 'zod/v4';
import { IntegrityError } from '../errors.js';
import { logger } from '../logger.js';
import {
  BUDGET_PERIODS,
  TRANSACTION_TYPES,
  type EntityKind,
  type EntityMap,
  type EntityStore,
  type FilterMap,
  type NewEntityMap
} from './types.js';

type SqlValue = string | number | null;
type Assignment = [column: string, value: SqlValue | undefined];
type Condition = [clause: string, value: SqlValue | undefined];

interface TableSpec<E, N, F> {
  table: string
  orderBy: string
  parse: (row: unknown) => E
  assignments: (values: Partial<N>) => Assignment[]
  conditions: (filter: F) => Condition[]
}

type TableSpecs = { [K in EntityKind]: TableSpec<EntityMap[K], NewEntityMap[K], FilterMap[K]> };

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    category_id INTEGER NOT NULL,
    amount REAL NOT NULL CHECK(amount >= 0),
    description TEXT,
    type TEXT NOT NULL CHECK(type IN ('income', 'expense')),
    date INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
    FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE RESTRICT
  );

  CREATE TABLE IF NOT EXISTS budgets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    category_id INTEGER NOT NULL,
    amount REAL NOT NULL CHECK(amount >= 0),
    period TEXT NOT NULL DEFAULT 'monthly' CHECK(period IN ('weekly', 'monthly', 'yearly')),
    created_at INTEGER NOT NULL,
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
    FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE RESTRICT
  );

  CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions(user_id, date);
  CREATE INDEX IF NOT EXISTS idx_transactions_category ON transactions(category_id);
  CREATE INDEX IF NOT EXISTS idx_budgets_user ON budgets(user_id);
  CREATE INDEX IF NOT EXISTS idx_budgets_category ON budgets(category_id);
`;

const epochMs = z.number().transform(ms => new Date(ms));

const userRow = z.object({
  id: z.number(),
  name: z.string(),
  email: z.string(),
  created_at: epochMs
}).transform(r => ({ id: r.id, name: r.name, email: r.email, createdAt: r.created_at }));

const categoryRow = z.object({
  id: z.number(),
  name: z.string(),
  created_at: epochMs
}).transform(r => ({ id: r.id, name: r.name, createdAt: r.created_at }));

const transactionRow = z.object({
  id: z.number(),
  user_id: z.number(),
  category_id: z.number(),
  amount: z.number(),
  description: z.string().nullable(),
  type: z.enum(TRANSACTION_TYPES),
  date: epochMs,
  created_at: epochMs
}).transform(r => ({
  id: r.id,
  userId: r.user_id,
  categoryId: r.category_id,
  amount: r.amount,
  description: r.description,
  type: r.type,
  date: r.date,
  createdAt: r.created_at
}));

const budgetRow = z.object({
  id: z.number(),
  user_id: z.number(),
  category_id: z.number(),
  amount: z.number(),
  period: z.enum(BUDGET_PERIODS),
  created_at: epochMs
}).transform(r => ({
  id: r.id,
  userId: r.user_id,
  categoryId: r.category_id,
  amount: r.amount,
  period: r.period,
  createdAt: r.created_at
}));

const specs: TableSpecs = {
  user: {
    table: 'users',
    orderBy: 'id ASC',
    parse: row => userRow.parse(row),
    assignments: v => [['name', v.name], ['email', v.email]],
    conditions: f => [['email = ?', f.email]]
  },
  category: {
    table: 'categories',
    orderBy: 'id ASC',
    parse: row => categoryRow.parse(row),
    assignments: v => [['name', v.name]],
    conditions: f => [['name = ?', f.name]]
  },
  transaction: {
    table: 'transactions',
    orderBy: 'date DESC, id DESC',
    parse: row => transactionRow.parse(row),
    assignments: v => [
      ['user_id', v.userId],
      ['category_id', v.categoryId],
      ['amount', v.amount],
      ['description', v.description],
      ['type', v.type],
      ['date', v.date?.getTime()]
    ],
    conditions: f => [
      ['user_id = ?', f.userId],
      ['category_id = ?', f.categoryId],
      ['type = ?', f.type],
      ['date >= ?', f.startDate?.getTime()],
      ['date <= ?', f.endDate?.getTime()],
      ['date < ?', f.before?.getTime()]
    ]
  },
  budget: {
    table: 'budgets',
    orderBy: 'id ASC',
    parse: row => budgetRow.parse(row),
    assignments: v => [
      ['user_id', v.userId],
      ['category_id', v.categoryId],
      ['amount', v.amount],
      ['period', v.period]
    ],
    conditions: f => [
      ['user_id = ?', f.userId],
      ['category_id = ?', f.categoryId]
    ]
  }
};

const isSet = <T extends [string, SqlValue | undefined]>(pair: T): pair is T & [string, SqlValue] => pair[1] !== undefined;

const constraintMessage = (code: string, message: string): string => {
  switch (code) {
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return 'Operation violates a foreign key: the record is missing a referenced row or is still referenced by other rows';
    case 'SQLITE_CONSTRAINT_UNIQUE':
      return `Duplicate value: ${message}`;
    case 'SQLITE_CONSTRAINT_CHECK':
      return `Value rejected by a check constraint: ${message}`;
    case 'SQLITE_CONSTRAINT_NOTNULL':
      return `Missing required value: ${message}`;
    default:
      return message;
  }
};

/**
 * Runs a statement and turns SQLite constraint failures into IntegrityError.
 */
const guard = <T>(operation: string, fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT')) {
      logger.debug('Store constraint violation', { operation, code: error.code, error: error.message });
      throw new IntegrityError(constraintMessage(error.code, error.message));
    }
    throw error;
  }
};

export class SqliteStore implements EntityStore {
  private readonly db: Database.Database;

  constructor (filename: string) {
    this.db = new Database(filename);
    this.db.pragma('foreign_keys = ON');
    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);
  }

  get<K extends EntityKind>(kind: K, id: number): EntityMap[K] | null {
    const spec: TableSpec<EntityMap[K], NewEntityMap[K], FilterMap[K]> = specs[kind];
    const row = this.db.prepare(`SELECT * FROM ${spec.table} WHERE id = ?`).get(id);
    return row === undefined ? null : spec.parse(row);
  }

  find<K extends EntityKind>(kind: K, filter?: FilterMap[K]): Array<EntityMap[K]> {
    const spec: TableSpec<EntityMap[K], NewEntityMap[K], FilterMap[K]> = specs[kind];
    const conditions = filter === undefined ? [] : spec.conditions(filter).filter(isSet);
    const where = conditions.length > 0 ? ` WHERE ${conditions.map(([clause]) => clause).join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM ${spec.table}${where} ORDER BY ${spec.orderBy}`)
      .all(...conditions.map(([, value]) => value));
    return rows.map(row => spec.parse(row));
  }

  insert<K extends EntityKind>(kind: K, values: NewEntityMap[K]): EntityMap[K] {
    const spec: TableSpec<EntityMap[K], NewEntityMap[K], FilterMap[K]> = specs[kind];
    const assignments = spec.assignments(values).filter(isSet);
    const columns = [...assignments.map(([column]) => column), 'created_at'];
    const params = [...assignments.map(([, value]) => value), Date.now()];
    const sql = `INSERT INTO ${spec.table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`;

    const result = guard(`insert ${kind}`, () => this.db.prepare(sql).run(...params));
    const created = this.get(kind, Number(result.lastInsertRowid));
    if (created === null) {
      throw new Error(`Inserted ${kind} could not be read back`);
    }
    return created;
  }

  update<K extends EntityKind>(kind: K, id: number, changes: Partial<NewEntityMap[K]>): EntityMap[K] | null {
    const spec: TableSpec<EntityMap[K], NewEntityMap[K], FilterMap[K]> = specs[kind];
    const assignments = spec.assignments(changes).filter(isSet);
    if (assignments.length > 0) {
      const sql = `UPDATE ${spec.table} SET ${assignments.map(([column]) => `${column} = ?`).join(', ')} WHERE id = ?`;
      guard(`update ${kind}`, () => this.db.prepare(sql).run(...assignments.map(([, value]) => value), id));
    }
    return this.get(kind, id);
  }

  delete (kind: EntityKind, id: number): boolean {
    const { table } = specs[kind];
    const result = guard(`delete ${kind}`, () => this.db.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id));
    return result.changes > 0;
  }

  close (): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

export const openStore = (filename: string): SqliteStore => {
  const store = new SqliteStore(filename);
  logger.info('Opened finance store', { filename });
  return store;
};
