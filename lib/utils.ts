/**
 * Utility functions
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export class Logger {
  static level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL);

  static log(level: LogLevel, message: string, obj?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...(obj && { data: obj }),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, obj?: Record<string, unknown>) {
    this.log('info', message, obj);
  }

  static warn(message: string, obj?: Record<string, unknown>) {
    this.log('warn', message, obj);
  }

  static error(message: string, obj?: Record<string, unknown>) {
    this.log('error', message, obj);
  }

  static debug(message: string, obj?: Record<string, unknown>) {
    this.log('debug', message, obj);
  }
}

export class Crypto {
  static sha256(input: string | Buffer): string {
    return createHash('sha256').update(input).digest('hex');
  }

  static uuid(): string {
    return uuidv4();
  }
}

export class Clock {
  static nowUtc(): Date {
    return new Date();
  }
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (!text || typeof text !== 'string') {
    return '';
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - suffix.length) + suffix;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
