#!/usr/bin/env node
/**
 * Download server entry point
 *
 * USAGE: tsx src/cli.ts [--port 8080] [--root files] [--queue-size 1000] [--workers 100] [--timeout 1200000] [--log-level info]
 *
 * Exits with status 1 when the download directory cannot be created or the
 * port cannot be bound. SIGINT/SIGTERM stop admissions, let admitted downloads
 * finish (each is still bounded by the request timeout), then close the server.
 */

import { createLogger } from './lib/create-logger.ts';
import { ensureRootDir } from './lib/ensure-root-dir.ts';
import { createDownloadServer } from './server.ts';
import { connectHttp } from './transports/http.ts';
import { parseConfig } from './transports/parse-config.ts';

async function main() {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);

  const rootDir = await ensureRootDir(config.rootDir, logger);
  const server = createDownloadServer({ ...config, rootDir }, { logger });
  const { close } = await connectHttp(server.app, { logger, port: config.port });

  logger.info(`Serving ${rootDir} with ${config.workers} workers and a queue of ${config.queueCapacity}`);
  logger.info(`Use http://localhost:${config.port}/download?file=<filename> to download a file.`);
  logger.info(`Use http://localhost:${config.port}/health to check server status.`);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, draining downloads...`);
    server
      .close()
      .then(close)
      .then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        }
      );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
