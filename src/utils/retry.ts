/**
 * Retries for remote document reads (S3, Parameter Store)
 *
 * Whether a failure is worth another attempt is read from the AWS SDK's own
 * error metadata, not from message text.
 */

import { DocumentSourceError } from '../types/errors';
import { isPlainObject } from './objects';
import { createCorrelatedLogger } from './logger';

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number; // milliseconds
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelay: 200,
  maxDelay: 2000,
  backoffMultiplier: 2,
};

const THROTTLING_ERROR_NAMES = new Set([
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'SlowDown',
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
]);

/**
 * Whether a failed SDK call may succeed if repeated
 *
 * Transient means: the SDK marked it `$retryable`, the service answered 429
 * or 5xx, the error is a throttling error, or the connection dropped.
 */
export function isTransientSourceError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('$retryable' in error && error.$retryable) {
    return true;
  }
  if ('$metadata' in error && isPlainObject(error.$metadata)) {
    const status = error.$metadata.httpStatusCode;
    if (typeof status === 'number' && (status === 429 || status >= 500)) {
      return true;
    }
  }
  if ('name' in error && typeof error.name === 'string' && THROTTLING_ERROR_NAMES.has(error.name)) {
    return true;
  }
  return 'code' in error && typeof error.code === 'string' && TRANSIENT_NETWORK_CODES.has(error.code);
}

const describeFailure = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface SourceReadOptions {
  /** Location reported in errors, e.g. s3://bucket/key */
  location: string;
  /** SDK operation name for logs, e.g. GetObject */
  operation: string;
  /** Prefix for the final error message, e.g. "failed to read object" */
  failureMessage: string;
  correlationId: string;
  retryConfig?: Partial<RetryConfig>;
}

/**
 * Runs a document read, repeating transient failures with exponential backoff
 *
 * A {@link DocumentSourceError} thrown by `read` is passed through unchanged.
 *
 * @throws {DocumentSourceError} When the read fails permanently or every attempt fails
 *
 * @example
 * ```typescript
 * const text = await readWithRetry(
 *   () => fetchObjectText('deploy-config', 'environments.json'),
 *   {
 *     location: 's3://deploy-config/environments.json',
 *     operation: 'GetObject',
 *     failureMessage: 'failed to read object',
 *     correlationId: 'eres-123',
 *   },
 * );
 * ```
 */
export async function readWithRetry<T>(
  read: () => Promise<T>,
  options: SourceReadOptions,
): Promise<T> {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options.retryConfig };
  const logger = createCorrelatedLogger(options.correlationId, {
    operation: options.operation,
    origin: options.location,
  });

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await read();
      if (attempt > 1) {
        logger.info('Source read succeeded after retry', { attempts: attempt });
      }
      return result;
    } catch (error) {
      if (error instanceof DocumentSourceError) {
        throw error;
      }

      const transient = isTransientSourceError(error);
      if (!transient || attempt > config.maxRetries) {
        const failure = new DocumentSourceError(
          `${options.failureMessage}: ${describeFailure(error)}`,
          options.location,
          { operation: options.operation, attempts: attempt, transient },
        );
        logger.error('Source read failed', failure, { attempts: attempt, transient });
        throw failure;
      }

      const delayMs = Math.min(
        config.baseDelay * Math.pow(config.backoffMultiplier, attempt - 1),
        config.maxDelay,
      );
      logger.warn('Source read failed, will retry', {
        attempt,
        maxRetries: config.maxRetries,
        delayMs,
        reason: describeFailure(error),
      });
      await sleep(delayMs);
    }
  }
}
