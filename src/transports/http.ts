import type express from 'express';
import * as http from 'http';
import type { Logger, SetupHttpTransportResult } from '../types.ts';

export interface ConnectHttpOptions {
  logger: Logger;
  port: number;
  /** @default all interfaces */
  host?: string;
}

/**
 * Bind an Express app to a port
 *
 * Server limits: 60s to receive a request, 120s keep-alive idle, 1 MiB of
 * headers. Response bodies are not time-limited here; the request gate's
 * deadline bounds each download.
 *
 * @example
 * ```typescript
 * const { app } = createDownloadServer(config, { logger });
 * const { close, httpServer } = await connectHttp(app, { logger, port: 8080 });
 * ```
 */
export async function connectHttp(app: express.Application, options: ConnectHttpOptions): Promise<SetupHttpTransportResult> {
  const { logger, port, host } = options;

  const httpServer = http.createServer({ maxHeaderSize: 1024 * 1024 }, app);
  httpServer.requestTimeout = 60_000;
  httpServer.keepAliveTimeout = 120_000;

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use. This usually means another process is using this port, ` + `or a previous instance didn't shut down cleanly. Try running: lsof -ti :${port} | xargs kill -9`));
      } else {
        reject(err);
      }
    });

    httpServer.listen(port, host, () => {
      httpServer.removeAllListeners('error');
      logger.info(`HTTP server listening on port ${port}`);
      resolve();
    });
  });

  const close = async () => {
    logger.info('Shutting down HTTP server...');
    httpServer.closeAllConnections();
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });
  };

  return { close, httpServer };
}
