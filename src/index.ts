/**
 * @fileoverview Environment resolver public API
 *
 * Turns declarative environment documents into validated, merged and
 * frozen deployment descriptors.
 *
 * @example
 * ```typescript
 * import { EnvironmentResolver, FileDocumentSource } from 'deploy-env-resolver';
 *
 * const resolver = new EnvironmentResolver({ defaults: { region: 'us-east-1' } });
 * await resolver.loadFrom(new FileDocumentSource('config/environments.json'));
 * const production = resolver.resolve('production');
 * ```
 */

export * from './types';
export * from './resolver';
export { parseEnvironmentDocument, parseDefaultsDocument } from './parsers/document-parser';
export * from './sources';
export { Logger, LogLevel, logger, createCorrelatedLogger, type LogContext } from './utils/logger';
export {
  readWithRetry,
  isTransientSourceError,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type SourceReadOptions,
} from './utils/retry';
export { getEnvironmentConfig, environmentConfig } from './config/environment';
export { runShowConfig, describeEnvironment } from './cli/summary';
