/**
 * Logging Middleware - one line per finished or abandoned HTTP request
 *
 * Download progress and failures are logged by the transfer pipeline itself;
 * this layer only records method, target, status and duration at debug level.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { formatRequestTarget } from '../lib/format-request-target.ts';
import type { Logger } from '../types.ts';

/**
 * Logging middleware configuration
 */
export interface LoggingMiddlewareOptions {
  logger: Logger;
}

/**
 * @example
 * ```typescript
 * app.use(createLoggingMiddleware({ logger }));
 * ```
 */
export function createLoggingMiddleware(options: LoggingMiddlewareOptions): RequestHandler {
  const { logger } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const target = formatRequestTarget(req.originalUrl);

    res.on('close', () => {
      const elapsed = Date.now() - startTime;
      if (res.writableFinished) {
        logger.debug(`${req.method} ${target} ${res.statusCode} ${elapsed}ms`);
      } else {
        logger.debug(`${req.method} ${target} closed by client after ${elapsed}ms`);
      }
    });

    next();
  };
}
