/**
 * Utility functions
 */

import { v4 as uuidv4 } from 'uuid';
import { Config } from './config';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export class Logger {
  static log(level: LogLevel, message: string, obj?: Record<string, unknown>) {
    if (level === 'debug' && Config.LOG_LEVEL !== 'debug') {
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

export class Clock {
  static nowUtc(): Date {
    return new Date();
  }

  static toDateString(date: Date): string {
    return date.toISOString().split('T')[0];
  }

  static addHours(date: Date, hours: number): Date {
    return new Date(date.getTime() + hours * 60 * 60 * 1000);
  }
}

/**
 * Run id of the form `2026-10-18_1a2b3c4d`
 */
export function newRunId(now: Date = Clock.nowUtc()): string {
  return `${Clock.toDateString(now)}_${uuidv4().slice(0, 8)}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    delayMs?: number;
    backoff?: boolean;
    onError?: (error: Error, attempt: number) => void;
    /** Errors for which this returns false are rethrown without another attempt */
    shouldRetry?: (error: Error) => boolean;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoff = true,
    onError,
    shouldRetry,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (onError) {
        onError(lastError, attempt);
      }

      if (shouldRetry && !shouldRetry(lastError)) {
        throw lastError;
      }

      if (attempt < maxRetries) {
        const delay = backoff ? delayMs * Math.pow(2, attempt - 1) : delayMs;
        Logger.warn(`Retry attempt ${attempt}/${maxRetries} after ${delay}ms`, {
          error: lastError.message,
        });
        await sleep(delay);
      }
    }
  }

  throw lastError || new Error('Max retries exceeded');
}

export function truncate(text: string, maxLength: number, suffix = '...'): string {
  if (!text) {
    return '';
  }
  if (text.length <= maxLength) {
    return text;
  }
  return text.substring(0, maxLength - suffix.length) + suffix;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
