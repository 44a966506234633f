import { LOG_LEVEL, type LogLevel } from './config.js';

type Meta = Record<string, unknown>;

export interface Logger {
  trace: (msg: string, meta?: Meta) => void
  debug: (msg: string, meta?: Meta) => void
  info: (msg: string, meta?: Meta) => void
  warn: (msg: string, meta?: Meta) => void
  error: (msg: string, meta?: Meta) => void
}

export type LogSink = (level: LogLevel, line: string) => void;

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const formatLogLine = (level: LogLevel, message: string, meta?: Meta, time: Date = new Date()): string => {
  const payload = {
    level,
    time: time.toISOString(),
    msg: message,
    ...meta
  };
  return JSON.stringify(payload);
};

export const createLogger = (minLevel: LogLevel, sink: LogSink = consoleSink): Logger => {
  const log = (level: LogLevel, message: string, meta?: Meta): void => {
    if (levelOrder[level] < levelOrder[minLevel]) return;
    sink(level, formatLogLine(level, message, meta));
  };

  return {
    trace: (msg, meta) => { log('trace', msg, meta); },
    debug: (msg, meta) => { log('debug', msg, meta); },
    info: (msg, meta) => { log('info', msg, meta); },
    warn: (msg, meta) => { log('warn', msg, meta); },
    error: (msg, meta) => { log('error', msg, meta); }
  };
};

export const logger = createLogger(LOG_LEVEL);
