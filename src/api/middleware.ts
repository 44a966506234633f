import { type ErrorRequestHandler, type RequestHandler } from 'express';
import { isFinanceError } from '../errors.js';
import { logger } from '../logger.js';

export const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.debug('HTTP request', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt
    });
  });
  next();
};

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
};

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (isFinanceError(error)) {
    logger.debug('Request rejected', { path: req.originalUrl, error: error.name, message: error.message });
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (isBodyParseError(error)) {
    res.status(400).json({ error: 'Request body is not valid JSON' });
    return;
  }
  logger.error('Unhandled request error', { method: req.method, path: req.originalUrl, error: String(error) });
  res.status(500).json({ error: 'Internal server error' });
};
