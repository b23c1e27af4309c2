import { logger } from './logger.js';
import { sleep } from './math.js';

export interface RetryOptions {
  maxRetries: number;
  retryDelayMs: number;
}

/**
 * Execute a function with exponential backoff retry logic
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  options: RetryOptions
): Promise<T> {
  let lastError: Error = new Error(`${operationName} was not attempted`);

  for (let attempt = 1; attempt <= options.maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const delay = options.retryDelayMs * Math.pow(2, attempt - 1);

      logger.warn(`${operationName} failed (attempt ${attempt}/${options.maxRetries})`, {
        error: lastError.message,
        nextRetryIn: attempt < options.maxRetries ? `${delay}ms` : 'no more retries',
      });

      if (attempt < options.maxRetries) {
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
