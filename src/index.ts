/**
 * Public API
 */

export * from './shared';

export { loadConfig, ConfigurationError } from './backend/config';
export type { Config, LogConfig, LogLevel, NodeEnv, ServerConfig, ServiceConfig } from './backend/config';
export { createLogger, serializeError } from './backend/logger';
export type { LoggerSettings } from './backend/logger';
export { asyncHandler, errorHandler, notFoundHandler } from './backend/middleware/errorHandler';
export type { ErrorHandlerOptions } from './backend/middleware/errorHandler';
export { healthCheck, LIVENESS_PATH, READINESS_PATH } from './backend/middleware/healthCheck';
export type { HealthCheckOptions, Probe } from './backend/middleware/healthCheck';
export { levelForStatus, REQUEST_ID_HEADER, requestLogger } from './backend/middleware/requestLogger';
export type { RequestLoggerOptions } from './backend/middleware/requestLogger';
export { userContext, userFromHeaders } from './backend/middleware/userContext';
export type { UserExtractor } from './backend/middleware/userContext';
export { parseRequestBody } from './backend/requestBody';
export { createApp, start } from './backend/server';
export type { AppOptions, StartOptions } from './backend/server';
export type { UserContext } from './backend/types';
