import { createApp } from './app.js';
import { DATABASE_PATH, HOST, PORT, SEED_DEFAULT_CATEGORIES } from './config.js';
import { logger } from './logger.js';
import { createServices } from './services.js';
import { openStore } from './store/sqliteStore.js';

const store = openStore(DATABASE_PATH);
const services = createServices(store);

if (SEED_DEFAULT_CATEGORIES) {
  services.finance.seedDefaultCategories();
}

const { app, mcp } = createApp(services, { host: HOST });

const httpServer = app.listen(PORT, HOST, (error?: Error) => {
  if (error != null) {
    logger.error('Failed to start server', { error: String(error) });
    process.exit(1);
  }
  logger.info('Finance tracker listening', { host: HOST, port: PORT });
});

const gracefulShutdown = async (): Promise<void> => {
  logger.info('Shutting down server');
  await mcp.close();
  await new Promise<void>(resolve => {
    httpServer.close(error => {
      if (error != null) {
        logger.error('Error closing HTTP server', { error: String(error) });
      }
      resolve();
    });
  });
  try {
    store.close();
  } catch (error) {
    logger.error('Error closing finance store', { error: String(error) });
  }
  logger.info('Server shutdown complete');
  process.exit(0);
};

process.on('SIGINT', () => { void gracefulShutdown(); });
process.on('SIGTERM', () => { void gracefulShutdown(); });
