/**
 * Configuration management for the Docs & Drive MCP server
 * All configuration is loaded from environment variables
 */

import type { AuthMode, LogLevel } from './types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
const AUTH_MODES: readonly AuthMode[] = ['oauth', 'service_account'];
const NODE_ENVS: ReadonlyArray<Config['nodeEnv']> = ['development', 'production', 'test'];

/**
 * Application configuration loaded from environment
 */
export interface Config {
  // Runtime
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;

  // Google Auth
  authMode: AuthMode;
  credentialsPath: string;
  tokenPath: string;
  serviceAccountPath: string;
  oauthCallbackPort: number;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return (values as readonly string[]).includes(value);
}

/**
 * Loads configuration from environment variables
 * Throws if a variable holds a value outside its allowed set
 */
export function loadConfig(): Config {
  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  if (!isOneOf(NODE_ENVS, nodeEnvRaw)) {
    throw new Error(`NODE_ENV must be one of ${NODE_ENVS.join(', ')} (got '${nodeEnvRaw}')`);
  }

  const logLevelRaw = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
  if (!isOneOf(LOG_LEVELS, logLevelRaw)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got '${logLevelRaw}')`);
  }

  const authModeRaw = process.env.GOOGLE_AUTH_MODE || 'oauth';
  if (!isOneOf(AUTH_MODES, authModeRaw)) {
    throw new Error(`GOOGLE_AUTH_MODE must be one of ${AUTH_MODES.join(', ')} (got '${authModeRaw}')`);
  }

  const portRaw = process.env.OAUTH_CALLBACK_PORT || '0';
  const oauthCallbackPort = Number(portRaw);
  if (!Number.isInteger(oauthCallbackPort) || oauthCallbackPort < 0 || oauthCallbackPort > 65535) {
    throw new Error(`OAUTH_CALLBACK_PORT must be an integer between 0 and 65535 (got '${portRaw}')`);
  }

  return {
    nodeEnv: nodeEnvRaw,
    logLevel: logLevelRaw,
    authMode: authModeRaw,
    credentialsPath: process.env.GOOGLE_CREDENTIALS_PATH || 'credentials.json',
    tokenPath: process.env.GOOGLE_TOKEN_PATH || 'token.json',
    serviceAccountPath: process.env.GOOGLE_SERVICE_ACCOUNT_PATH || 'service-account.json',
    oauthCallbackPort,
  };
}

/**
 * Singleton config instance
 */
let configInstance: Config | null = null;

/**
 * Gets the application configuration
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Resets the config instance (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
