/**
 * Utility functions
 */

import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { Config, type LogLevel } from './config';

type LogData = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  static level: LogLevel = Config.LOG_LEVEL;

  static log(level: Exclude<LogLevel, 'silent'>, message: string, data?: LogData) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data && { data }),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else if (level === 'warn') {
      console.warn(JSON.stringify(logEntry));
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  static info(message: string, data?: LogData) {
    this.log('info', message, data);
  }

  static warn(message: string, data?: LogData) {
    this.log('warn', message, data);
  }

  static error(message: string, data?: LogData) {
    this.log('error', message, data);
  }

  static debug(message: string, data?: LogData) {
    this.log('debug', message, data);
  }
}

export class Crypto {
  static uuid(): string {
    return uuidv4();
  }
}

export class Clock {
  static nowUtc(): Date {
    return new Date();
  }

  static addHours(date: Date, hours: number): Date {
    return new Date(date.getTime() + hours * 60 * 60 * 1000);
  }

  /**
   * Compact local timestamp used to name generated artifacts, e.g. 20260418_071500
   */
  static toFileStamp(date: Date): string {
    return format(date, 'yyyyMMdd_HHmmss');
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (!text) {
    return '';
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength) + suffix;
}

export function cleanText(text: string | undefined | null): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/\s+/g, ' ')
    .trim();
}

export function parseDate(value: string | undefined | null): Date | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}
