import { Router } from 'express';
import { APP_VERSION } from '../config.js';
import { parseInput } from '../schemas/common.js';
import {
  budgetQuery,
  createBudgetBody,
  createCategoryBody,
  createTransactionBody,
  createUserBody,
  idParamsSchema,
  periodQuery,
  transactionQuery,
  trendQuery,
  updateBudgetBody,
  updateTransactionBody,
  userIdParamsSchema
} from '../schemas/finance.js';
import { type Services } from '../services.js';
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
} from './serialize.js';

export const createApiRouter = ({ store, finance, analytics }: Services): Router => {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString(), version: APP_VERSION });
  });

  // Users

  router.post('/users', (req, res) => {
    const body = parseInput(createUserBody, req.body);
    res.status(201).json(serializeUser(finance.createUser(body)));
  });

  router.get('/users', (_req, res) => {
    res.json(finance.getUsers().map(serializeUser));
  });

  router.get('/users/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    res.json(serializeUser(finance.getUser(id)));
  });

  router.delete('/users/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    finance.deleteUser(id);
    res.json({ message: 'User deleted successfully' });
  });

  // Categories

  router.get('/categories', (_req, res) => {
    res.json(finance.getCategories().map(serializeCategory));
  });

  router.post('/categories', (req, res) => {
    const body = parseInput(createCategoryBody, req.body);
    res.status(201).json(serializeCategory(finance.createCategory(body)));
  });

  router.delete('/categories/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    finance.deleteCategory(id);
    res.json({ message: 'Category deleted successfully' });
  });

  // Transactions

  router.post('/transactions', (req, res) => {
    const body = parseInput(createTransactionBody, req.body);
    const txn = finance.createTransaction({
      userId: body.user_id,
      categoryId: body.category_id,
      amount: body.amount,
      description: body.description,
      type: body.type,
      date: body.date
    });
    res.status(201).json(serializeTransaction(txn, resolveCategoryNames(store, [txn])));
  });

  router.get('/transactions', (req, res) => {
    const query = parseInput(transactionQuery, req.query);
    const txns = finance.getTransactions({
      userId: query.user_id,
      categoryId: query.category_id,
      type: query.type,
      startDate: query.start_date,
      endDate: query.end_date
    });
    res.json(serializeTransactions(store, txns));
  });

  router.get('/transactions/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    const txn = finance.getTransaction(id);
    res.json(serializeTransaction(txn, resolveCategoryNames(store, [txn])));
  });

  router.put('/transactions/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    const body = parseInput(updateTransactionBody, req.body);
    const txn = finance.updateTransaction(id, {
      categoryId: body.category_id,
      amount: body.amount,
      description: body.description,
      type: body.type,
      date: body.date
    });
    res.json(serializeTransaction(txn, resolveCategoryNames(store, [txn])));
  });

  router.delete('/transactions/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    finance.deleteTransaction(id);
    res.json({ message: 'Transaction deleted successfully' });
  });

  // Budgets

  router.post('/budgets', (req, res) => {
    const body = parseInput(createBudgetBody, req.body);
    const budget = finance.createBudget({
      userId: body.user_id,
      categoryId: body.category_id,
      amount: body.amount,
      period: body.period
    });
    res.status(201).json(serializeBudget(budget, resolveCategoryNames(store, [budget])));
  });

  router.get('/budgets', (req, res) => {
    const query = parseInput(budgetQuery, req.query);
    res.json(serializeBudgets(store, finance.getBudgets(query.user_id)));
  });

  router.put('/budgets/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    const body = parseInput(updateBudgetBody, req.body);
    const budget = finance.updateBudget(id, {
      categoryId: body.category_id,
      amount: body.amount,
      period: body.period
    });
    res.json(serializeBudget(budget, resolveCategoryNames(store, [budget])));
  });

  router.delete('/budgets/:id', (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    finance.deleteBudget(id);
    res.json({ message: 'Budget deleted successfully' });
  });

  // Analytics

  router.get('/analytics/summary/:userId', (req, res) => {
    const { userId } = parseInput(userIdParamsSchema, req.params);
    const { period } = parseInput(periodQuery, req.query);
    res.json(serializeSummary(analytics.getFinancialSummary(userId, period)));
  });

  router.get('/analytics/spending-by-category/:userId', (req, res) => {
    const { userId } = parseInput(userIdParamsSchema, req.params);
    const { period } = parseInput(periodQuery, req.query);
    res.json(analytics.getSpendingByCategory(userId, period).map(serializeCategorySpending));
  });

  router.get('/analytics/monthly-trend/:userId', (req, res) => {
    const { userId } = parseInput(userIdParamsSchema, req.params);
    const { months } = parseInput(trendQuery, req.query);
    res.json(analytics.getMonthlyTrend(userId, months).map(serializeTrendEntry));
  });

  router.get('/analytics/budget-status/:userId', (req, res) => {
    const { userId } = parseInput(userIdParamsSchema, req.params);
    res.json(analytics.getBudgetStatus(userId).map(serializeBudgetStatus));
  });

  return router;
};
