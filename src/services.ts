import { AnalyticsService } from './analytics/service.js';
import { FinanceService } from './finance/service.js';
import { type EntityStore } from './store/types.js';

export interface Services {
  store: EntityStore
  finance: FinanceService
  analytics: AnalyticsService
}

export const createServices = (store: EntityStore, clock: () => Date = () => new Date()): Services => ({
  store,
  finance: new FinanceService(store, clock),
  analytics: new AnalyticsService(store, clock)
});
