/**
 * Error handling system with user-friendly messages
 * @module utils/errorHandler
 */

import { logger } from './logger.js';

/**
 * Error types for categorizing different failure modes
 */
export const ErrorTypes = {
  NETWORK: 'NetworkError',
  VALIDATION: 'ValidationError',
  DATA_FORMAT: 'DataFormatError',
  TIMEOUT: 'TimeoutError',
  API: 'ApiError',
  PARSE: 'ParseError'
} as const;

export type ErrorType = (typeof ErrorTypes)[keyof typeof ErrorTypes];

/**
 * Error carrying a category, a message fit for the page and debugging context
 */
export class AppError extends Error {
  type: ErrorType;
  userMessage: string;
  context: Record<string, unknown>;
  timestamp: number;

  constructor(
    type: ErrorType,
    message: string,
    userMessage: string | null = null,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'AppError';
    this.type = type;
    this.userMessage = userMessage || AppError.getDefaultUserMessage(type);
    this.context = context;
    this.timestamp = Date.now();
  }

  static getDefaultUserMessage(type: ErrorType): string {
    const messages: Partial<Record<ErrorType, string>> = {
      [ErrorTypes.NETWORK]: 'Connection problem. Please check your internet and try again.',
      [ErrorTypes.VALIDATION]: 'Please check your input and try again.',
      [ErrorTypes.DATA_FORMAT]: 'Data format issue. Please refresh and try again.',
      [ErrorTypes.TIMEOUT]: 'Request timed out. Please try again.',
      [ErrorTypes.API]: 'Service temporarily unavailable. Please try again later.'
    };
    return messages[type] || 'Something went wrong. Please try again.';
  }
}

/**
 * Read a `name`/`message` pair off an unknown thrown value.
 * @param error
 */
function describeThrown(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: typeof error, message: String(error) };
}

export type ExtendedRequestInit = RequestInit & { timeout?: number; retries?: number; retryDelay?: number };

/**
 * Fetch with a timeout, HTTP status checking and retry
 * @param input - URL or Request object
 * @param init - Fetch options
 * @returns The successful response
 */
export async function safeFetch(input: string | Request, init: ExtendedRequestInit = {}): Promise<Response> {
  const { timeout = 10000, retries = 2, retryDelay = 1000, ...fetchOptions } = init;

  const singleFetch = async (): Promise<Response> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    try {
      const response = await fetch(input, {
        ...fetchOptions,
        signal: controller.signal
      });

      if (!response.ok) {
        throw new AppError(
          ErrorTypes.API,
          `HTTP ${response.status}: ${response.statusText}`,
          response.status === 404
            ? 'The requested data was not found.'
            : response.status >= 500
              ? 'Server is temporarily unavailable.'
              : 'Request failed. Please try again.',
          { status: response.status }
        );
      }

      return response;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const { name, message } = describeThrown(error);
      if (name === 'AbortError') {
        throw new AppError(ErrorTypes.TIMEOUT, 'Request timed out', null, { timeout });
      }
      if (name === 'TypeError') {
        throw new AppError(ErrorTypes.NETWORK, `Network connection failed: ${message}`, null, {
          originalError: error
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  };

  const url = typeof input === 'string' ? input : input.url;
  return withRetry(singleFetch, {
    maxAttempts: retries + 1,
    delayMs: retryDelay,
    onAttemptFail: (error, attempt, maxAttempts) => {
      if (attempt < maxAttempts) {
        logger.warn(`Request for ${url} failed (attempt ${attempt}/${maxAttempts}), retrying`, describeThrown(error).message);
      }
    }
  });
}

/**
 * Validation helpers for untrusted artifact fields
 */
export const validators = {
  array(value: unknown, field = 'value'): unknown[] {
    if (!Array.isArray(value)) {
      throw new AppError(ErrorTypes.VALIDATION, `${field} must be an array`);
    }
    return value;
  },

  record(value: unknown, field = 'value'): Record<string, unknown> {
    if (!isRecord(value)) {
      throw new AppError(ErrorTypes.VALIDATION, `${field} must be an object`);
    }
    return value;
  }
};

/**
 * Plain-object guard (arrays and null excluded)
 * @param value
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple assertion helper for validation
 * @param condition - Value to test for truthiness
 * @param message - Error message if assertion fails
 * @throws {AppError} If condition is falsy
 */
export function assert(condition: unknown, message = 'Assertion failed'): asserts condition {
  if (!condition) {
    throw new AppError(ErrorTypes.VALIDATION, message);
  }
}

/**
 * Type validation helper
 * @param value - Value to validate
 * @param expectedType - Expected type name, or 'array'
 * @param paramName - Parameter name for error message
 */
export function validateType(value: unknown, expectedType: string, paramName = 'value'): void {
  const actualType = Array.isArray(value) ? 'array' : typeof value;
  if (actualType !== expectedType) {
    throw new AppError(ErrorTypes.VALIDATION, `${paramName} must be ${expectedType}, got ${actualType}`);
  }
}

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay between attempts in milliseconds (default: 1000) */
  delayMs?: number;
  onAttemptFail?: (error: unknown, attempt: number, maxAttempts: number) => void;
}

/**
 * Retry wrapper for async operations with exponential backoff
 * @param operation - Async operation to retry
 * @param options - Retry configuration options
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 3, delayMs = 1000, onAttemptFail } = options;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (onAttemptFail) {
        onAttemptFail(error, attempt, maxAttempts);
      }

      if (attempt === maxAttempts) {
        throw error;
      }

      const delay = delayMs * 2 ** (attempt - 1);
      await new Promise(resolve => {
        setTimeout(resolve, delay);
      });
    }
  }

  throw lastError;
}

/**
 * Run a synchronous operation, logging a failure and returning the fallback instead
 * @param operation - Synchronous operation to execute
 * @param errorMessage - Prefix for the warning logged on failure
 * @param fallback - Value returned when the operation throws
 */
export function safeSync<T>(operation: () => T, errorMessage: string, fallback: T): T {
  try {
    return operation();
  } catch (error) {
    logger.exception(errorMessage, error);
    return fallback;
  }
}

/**
 * User-facing message for any thrown value
 * @param error
 */
export function getUserMessage(error: unknown): string {
  if (error instanceof AppError) {
    return error.userMessage;
  }
  return AppError.getDefaultUserMessage(ErrorTypes.API);
}

/**
 * Log unhandled errors and rejections instead of letting them surface as page errors
 * @param target - Defaults to `window`
 */
export function setupGlobalErrorHandler(target: Window | null = typeof window === 'undefined' ? null : window): void {
  if (!target) {
    return;
  }

  target.addEventListener('unhandledrejection', event => {
    logger.exception('Unhandled promise rejection', event.reason);
    event.preventDefault();
  });

  target.addEventListener('error', event => {
    logger.exception('Global error', event.error, {
      filename: event.filename,
      lineno: event.lineno,
      colno: event.colno
    });
  });
}
