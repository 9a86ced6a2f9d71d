import winston from 'winston';
import Transport from 'winston-transport';
import type { LogEntry } from '@pzws/shared-types';
import { addLogEntry } from './log-store';
import { config } from '../config/app.config';

interface LogInfo {
  level: string;
  message: unknown;
  timestamp?: string;
  stack?: string;
}

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function toEntryLevel(level: string): LogEntry['level'] {
  switch (level) {
    case 'error':
    case 'warn':
    case 'debug':
      return level;
    default:
      return 'info';
  }
}

class MemoryTransport extends Transport {
  log(info: LogInfo, callback: () => void): void {
    setImmediate(() => this.emit('logged', info));
    addLogEntry({
      time: info.timestamp || new Date().toISOString(),
      level: toEntryLevel(info.level),
      message: typeof info.message === 'string' ? info.message : safeStringify(info.message),
      exception: info.stack,
    });
    callback();
  }
}

export const logger = winston.createLogger({
  level: config.nodeEnv === 'production' ? 'info' : 'debug',
  format: logFormat,
  transports: [
    new MemoryTransport(),
    new winston.transports.Console({
      silent: config.nodeEnv === 'test',
      format: winston.format.combine(winston.format.colorize(), logFormat),
    }),
  ],
});
