/**
 * Utility functions
 */

import { v4 as uuidv4 } from 'uuid';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export class Logger {
  static log(level: LogLevel, message: string, obj?: Record<string, unknown>) {
    if (level === 'debug' && process.env.LOG_LEVEL !== 'debug') {
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
  static uuid(): string {
    return uuidv4();
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  backoff?: boolean;
  retryIf?: (error: unknown) => boolean;
  onError?: (error: unknown, attempt: number) => void;
}

/**
 * Run `fn` up to `maxRetries` times, rethrowing the last failure unchanged.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    delayMs = 1000,
    backoff = true,
    retryIf,
    onError,
  } = options;

  let lastError: unknown = new Error('Max retries exceeded');

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (onError) {
        onError(error, attempt);
      }

      if (retryIf && !retryIf(error)) {
        throw error;
      }

      if (attempt < maxRetries) {
        const delay = backoff ? delayMs * Math.pow(2, attempt - 1) : delayMs;
        Logger.warn(`Retry attempt ${attempt}/${maxRetries} after ${delay}ms`, {
          error: errorMessage(error),
        });
        await sleep(delay);
      }
    }
  }

  throw lastError;
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

export function cleanText(text: string): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Capitalize the first letter of every word and lower-case the rest.
 */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[\s\-/(])(\p{L})/gu, (_, lead: string, letter: string) => lead + letter.toUpperCase());
}

/**
 * Strip control characters other than line breaks and tabs.
 */
export function stripControlCharacters(text: string): string {
  return text.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '');
}
