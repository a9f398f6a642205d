/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Invalid values fail fast with a ConfigurationError.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const config = loadConfig();
 *   console.log(config.server.port);
 */

import 'dotenv/config';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface ServerConfig {
  port: number;
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
}

export interface ServiceConfig {
  /** Added to every log record as `service` */
  name: string;
  /** Added to every log record as `version` */
  version: string;
}

export interface LogConfig {
  level: LogLevel;
  /** Pretty-print through pino-pretty instead of JSON lines (never in production) */
  pretty: boolean;
  /** Include request headers and user agent in request logs */
  logHeaders: boolean;
}

export interface Config {
  server: ServerConfig;
  service: ServiceConfig;
  log: LogConfig;
}

type Env = Record<string, string | undefined>;

// =============================================================================
// Validation Helpers
// =============================================================================

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((env) => env === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get an environment variable with a default value
 */
function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Get a numeric environment variable
 */
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`
    );
  }
  return parsed;
}

/**
 * Get a boolean environment variable
 */
function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Validate node environment
 */
function parseNodeEnv(value: string): NodeEnv {
  if (isNodeEnv(value)) {
    return value;
  }
  return 'development'; // default
}

/**
 * Validate log level
 */
function parseLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new ConfigurationError(
    `Invalid LOG_LEVEL: "${value}". Expected one of: ${LOG_LEVELS.join(', ')}.`
  );
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = parseNodeEnv(getEnvWithDefault(env, 'NODE_ENV', 'development'));
  const isDevelopment = nodeEnv === 'development';
  const isProduction = nodeEnv === 'production';

  const port = getEnvNumber(env, 'PORT', 3000);
  if (port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid PORT: ${port}. Expected 0-65535.`);
  }

  return {
    server: {
      port,
      nodeEnv,
      isDevelopment,
      isProduction,
    },

    service: {
      name: getEnvWithDefault(env, 'SERVICE_NAME', 'service'),
      version: getEnvWithDefault(env, 'SERVICE_VERSION', '0.0.0'),
    },

    log: {
      level: parseLogLevel(getEnvWithDefault(env, 'LOG_LEVEL', isDevelopment ? 'debug' : 'info')),
      pretty: !isProduction && getEnvBoolean(env, 'LOG_PRETTY', isDevelopment),
      logHeaders: getEnvBoolean(env, 'LOG_HEADERS', false),
    },
  };
}
