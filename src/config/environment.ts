import type { LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  logJson: boolean;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  logJson: false,
};

/**
 * Returns the static environment configuration (ENV overrides are not supported).
 */
export function loadEnvironment(): EnvironmentConfig {
  return { ...DEFAULT_ENVIRONMENT };
}
