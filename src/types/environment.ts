/**
 * Process configuration types
 */

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface EnvironmentConfig {
  environment: 'development' | 'production' | 'test';
  awsRegion: string;
  logLevel: LogLevelName;
  platformMaxTimeoutSeconds: number;
}
