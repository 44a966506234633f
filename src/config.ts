export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some(level => level === value);

const parsePort = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT "${raw}". Use an integer between 0 and 65535.`);
  }
  return port;
};

const parseBoolean = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid boolean value "${raw}". Use true or false.`);
};

const parseLogLevel = (raw: string | undefined): LogLevel => {
  const normalized = (raw ?? 'info').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
};

export const PORT = parsePort(process.env.PORT, 5000);
export const HOST = process.env.HOST ?? '127.0.0.1';
export const DATABASE_PATH = process.env.DATABASE_PATH ?? './finance.db';
export const SEED_DEFAULT_CATEGORIES = parseBoolean(process.env.SEED_DEFAULT_CATEGORIES, true);
export const LOG_LEVEL = parseLogLevel(process.env.LOG_LEVEL);
export const APP_VERSION = process.env.APP_VERSION ?? '1.0.0';

export { parseBoolean, parseLogLevel, parsePort };
