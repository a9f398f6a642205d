/**
 * Express server setup - main entry point for the service.
 * Wires request logging, body parsing, health probes, the application's
 * routes and error handling, then starts the HTTP server.
 */

import express, { type Application, type Router } from 'express';
import type { Server } from 'http';
import type { Logger } from 'pino';
import { loadConfig, type Config } from './config';
import { createLogger, serializeError } from './logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { healthCheck, isHealthCheckPath, type Probe } from './middleware/healthCheck';
import { requestLogger } from './middleware/requestLogger';
import { coerceError } from '../shared/errors/coerce';
import type { ResponseErrorRegistry } from '../shared/errors/registry';

export interface AppOptions {
  logger: Logger;
  /** Maps known sentinels to their responses; errors are coerced without it */
  registry?: ResponseErrorRegistry;
  logHeaders?: boolean;
  /** Also record requests to the health probes */
  logHealthChecks?: boolean;
  readiness?: Probe;
  /** Application routes, mounted after the health probes */
  routes?: Router;
}

export function createApp(options: AppOptions): Application {
  const app = express();
  const { registry } = options;

  app.disable('x-powered-by');

  // Logging comes first so rejected bodies are recorded too
  app.use(
    requestLogger({
      logger: options.logger,
      logHeaders: options.logHeaders,
      ignore: options.logHealthChecks ? undefined : (req) => isHealthCheckPath(req.path),
    })
  );
  app.use(express.json());

  app.use(healthCheck({ readiness: options.readiness }));

  if (options.routes !== undefined) {
    app.use(options.routes);
  }

  app.use(notFoundHandler());
  app.use(
    errorHandler({
      resolve: registry === undefined ? coerceError : (err) => registry.resolve(err),
    })
  );

  return app;
}

/**
 * createApp options for `start`; the logger and header logging default to
 * the ones described by the configuration
 */
export type StartOptions = Partial<AppOptions>;

/**
 * Start the server. Resolves once it is listening.
 */
export const start = (config: Config = loadConfig(), options: StartOptions = {}): Promise<Server> => {
  const logger =
    options.logger ??
    createLogger({
      level: config.log.level,
      service: config.service.name,
      version: config.service.version,
      pretty: config.log.pretty,
    });
  const app = createApp({ ...options, logger, logHeaders: options.logHeaders ?? config.log.logHeaders });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.server.port);
    server.once('listening', () => {
      logger.info({ port: config.server.port, env: config.server.nodeEnv }, 'Server listening');
      resolve(server);
    });
    server.once('error', (err) => {
      logger.fatal({ err: serializeError(err, true) }, 'Server failed to start');
      reject(err);
    });
  });
};

// Start server when run directly
if (require.main === module) {
  start().catch(() => {
    process.exitCode = 1;
  });
}
