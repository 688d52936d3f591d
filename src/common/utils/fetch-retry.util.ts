import { LoggingService } from '../logging.service';
import { extractErrorMessage, toError } from './error.util';

export interface RetryOptions {
  maxRetries: number;
  initialDelay: number;
}

/**
 * Utility for retrying upstream HTTP fetches with exponential backoff
 *
 * Only transport failures are retried; an HTTP error status or a parsing
 * problem is thrown on the first attempt.
 */
export class FetchRetryUtil {
  private static readonly MAX_DELAY = 10000; // 10 seconds

  /**
   * Execute a fetch operation with retry logic
   */
  public static async executeWithRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    logger: LoggingService,
    context: string,
    options: RetryOptions
  ): Promise<T> {
    let lastError: Error = new Error(`${operationName} was not attempted`);

    for (let attempt = 1; attempt <= options.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = toError(error);

        if (!FetchRetryUtil.isRetryableError(error)) {
          throw lastError;
        }

        if (attempt < options.maxRetries) {
          const delay = FetchRetryUtil.calculateDelay(attempt, options.initialDelay);
          logger.warn(
            `${operationName} failed (attempt ${attempt}/${options.maxRetries}), retrying in ${delay}ms: ${extractErrorMessage(error)}`,
            context
          );
          await FetchRetryUtil.sleep(delay);
        } else {
          logger.error(`${operationName} failed after ${options.maxRetries} attempts`, error, context);
        }
      }
    }

    throw lastError;
  }

  /**
   * Check if an error is a transport failure worth retrying
   */
  public static isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }

    const cause = error.cause instanceof Error ? error.cause : undefined;
    const text = [error.name, error.message, cause?.name, cause?.message, FetchRetryUtil.errorCode(cause)]
      .filter((part): part is string => typeof part === 'string')
      .join(' ')
      .toLowerCase();

    const retryablePatterns = [
      'fetch failed',
      'connection reset',
      'connection refused',
      'socket hang up',
      'timeouterror',
      'econnreset',
      'econnrefused',
      'etimedout',
      'enotfound',
      'eai_again'
    ];

    return retryablePatterns.some(pattern => text.includes(pattern));
  }

  private static errorCode(error: Error | undefined): string | undefined {
    if (error && 'code' in error && typeof error.code === 'string') {
      return error.code;
    }
    return undefined;
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private static calculateDelay(attempt: number, initialDelay: number): number {
    const exponentialDelay = initialDelay * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, FetchRetryUtil.MAX_DELAY);

    // ±25% jitter
    const jitter = cappedDelay * 0.25 * (Math.random() - 0.5) * 2;

    return Math.round(cappedDelay + jitter);
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
