import { describe, it, expect, vi, afterEach } from 'vitest';
import { environmentConfig, getEnvironmentConfig } from './environment';

/**
 * Test Suite: Process Configuration
 *
 * Covers the defaults and validation applied to NODE_ENV, AWS_REGION,
 * LOG_LEVEL and PLATFORM_MAX_TIMEOUT_SECONDS. Invalid values must fail at
 * load time with a message naming the variable.
 */
describe('Environment Configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should have default values', () => {
    expect(environmentConfig.environment).toBeDefined();
    expect(environmentConfig.awsRegion).toBeDefined();
    expect(environmentConfig.logLevel).toBeDefined();
    expect(environmentConfig.platformMaxTimeoutSeconds).toBeGreaterThan(0);
  });

  it('should use NODE_ENV from environment', () => {
    // Vitest sets NODE_ENV to 'test' by default
    expect(environmentConfig.environment).toBe('test');
  });

  it('should default AWS region, log level and timeout ceiling', () => {
    delete process.env.AWS_REGION;
    delete process.env.LOG_LEVEL;
    delete process.env.PLATFORM_MAX_TIMEOUT_SECONDS;

    const config = getEnvironmentConfig();

    expect(config.awsRegion).toBe('us-east-1');
    expect(config.logLevel).toBe('INFO');
    expect(config.platformMaxTimeoutSeconds).toBe(900);
  });

  it('should default to development when NODE_ENV is not set', async () => {
    delete process.env.NODE_ENV;

    // Re-import to get fresh config
    vi.resetModules();
    const { environmentConfig: freshConfig } = await import('./environment');

    expect(freshConfig.environment).toBe('development');
  });

  it('should reject an unknown NODE_ENV', () => {
    process.env.NODE_ENV = 'staging';

    expect(() => getEnvironmentConfig()).toThrow(
      'Invalid NODE_ENV: "staging". Must be one of: development, production, test'
    );
  });

  it('should accept a lowercase LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'debug';

    expect(getEnvironmentConfig().logLevel).toBe('DEBUG');
  });

  it('should reject an unknown LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(() => getEnvironmentConfig()).toThrow('Invalid LOG_LEVEL: "verbose"');
  });

  it('should read PLATFORM_MAX_TIMEOUT_SECONDS', () => {
    process.env.PLATFORM_MAX_TIMEOUT_SECONDS = '300';

    expect(getEnvironmentConfig().platformMaxTimeoutSeconds).toBe(300);
  });

  it.each(['0', '-5', '12.5', 'abc'])(
    'should reject PLATFORM_MAX_TIMEOUT_SECONDS=%s',
    (value) => {
      process.env.PLATFORM_MAX_TIMEOUT_SECONDS = value;

      expect(() => getEnvironmentConfig()).toThrow(
        `Invalid PLATFORM_MAX_TIMEOUT_SECONDS: "${value}". Must be a positive integer`
      );
    }
  );
});
