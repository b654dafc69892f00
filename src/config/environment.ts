import type { EnvironmentConfig, LogLevelName } from '../types/environment';

/**
 * Default values for process configuration
 */
const DEFAULTS = {
  NODE_ENV: 'development' as const,
  AWS_REGION: 'us-east-1',
  LOG_LEVEL: 'INFO' as const,
  PLATFORM_MAX_TIMEOUT_SECONDS: 900,
} as const;

const ALLOWED_ENVIRONMENTS = ['development', 'production', 'test'] as const;
const ALLOWED_LOG_LEVELS: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

const isAllowedEnvironment = (
  value: string,
): value is EnvironmentConfig['environment'] =>
  ALLOWED_ENVIRONMENTS.some(env => env === value);

const isLogLevel = (value: string): value is LogLevelName =>
  ALLOWED_LOG_LEVELS.some(level => level === value);

/**
 * Reads LOG_LEVEL, accepting any letter case
 * @throws {Error} When the level is not one of DEBUG, INFO, WARN, ERROR
 */
const readLogLevel = (): LogLevelName => {
  const raw = process.env.LOG_LEVEL;
  if (!raw) {
    return DEFAULTS.LOG_LEVEL;
  }

  const level = raw.toUpperCase();
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid LOG_LEVEL: "${raw}". Must be one of: ${ALLOWED_LOG_LEVELS.join(', ')}`
    );
  }
  return level;
};

/**
 * Reads the platform's upper bound for timeoutSeconds
 * @throws {Error} When the value is not a positive integer
 */
const readPlatformMaxTimeout = (): number => {
  const raw = process.env.PLATFORM_MAX_TIMEOUT_SECONDS;
  if (!raw) {
    return DEFAULTS.PLATFORM_MAX_TIMEOUT_SECONDS;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `Invalid PLATFORM_MAX_TIMEOUT_SECONDS: "${raw}". Must be a positive integer`
    );
  }
  return value;
};

/**
 * Gets the current process configuration with validation and defaults
 * @returns {EnvironmentConfig} Validated configuration
 * @throws {Error} When a variable is present but invalid
 */
export const getEnvironmentConfig = (): EnvironmentConfig => {
  const nodeEnv = process.env.NODE_ENV || DEFAULTS.NODE_ENV;

  if (!isAllowedEnvironment(nodeEnv)) {
    throw new Error(
      `Invalid NODE_ENV: "${nodeEnv}". Must be one of: ${ALLOWED_ENVIRONMENTS.join(', ')}`
    );
  }

  return {
    environment: nodeEnv,
    awsRegion: process.env.AWS_REGION || DEFAULTS.AWS_REGION,
    logLevel: readLogLevel(),
    platformMaxTimeoutSeconds: readPlatformMaxTimeout(),
  };
};

/**
 * Process configuration instance with validation and defaults applied
 * @throws {Error} When environment validation fails
 */
export const environmentConfig = getEnvironmentConfig();
