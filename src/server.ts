import cors from 'cors';
import express from 'express';
import { createDownloadTask } from './file-serving/download-task.ts';
import { createDownloadRouter, createHealthRouter } from './file-serving/router.ts';
import { createLoggingMiddleware } from './middleware/logging.ts';
import { AdmissionQueue } from './queue/admission-queue.ts';
import { Dispatcher } from './queue/dispatcher.ts';
import { RequestGate } from './queue/request-gate.ts';
import type { PendingRequest } from './queue/types.ts';
import { WorkerSlots } from './queue/worker-slots.ts';
import type { Logger, ServerConfig } from './types.ts';

export interface DownloadServerOptions {
  logger: Logger;
  /** Bytes per read/write; the default is 32 KiB */
  chunkSize?: number;
}

export interface DownloadServer {
  app: express.Application;
  queue: AdmissionQueue<PendingRequest>;
  slots: WorkerSlots;
  dispatcher: Dispatcher;
  gate: RequestGate;
  /** Refuse new downloads and wait for admitted ones to finish */
  close: () => Promise<void>;
}

/**
 * Wire the admission queue, worker slots, dispatcher and request gate behind an
 * Express app serving `/download` and `/health`. The dispatcher is started
 * before this returns; bind the app with connectHttp().
 */
export function createDownloadServer(config: Pick<ServerConfig, 'rootDir' | 'queueCapacity' | 'workers' | 'requestTimeoutMs'>, options: DownloadServerOptions): DownloadServer {
  const { logger, chunkSize } = options;

  const queue = new AdmissionQueue<PendingRequest>(config.queueCapacity);
  const slots = new WorkerSlots(config.workers);
  const dispatcher = new Dispatcher({
    queue,
    slots,
    handler: createDownloadTask({ rootDir: config.rootDir, logger, chunkSize }),
    logger,
  });
  const gate = new RequestGate({ queue, logger, timeoutMs: config.requestTimeoutMs });

  const app = express();
  app.use(
    cors({
      origin: '*',
      exposedHeaders: ['Content-Disposition', 'Content-Length'],
    })
  );
  app.use(createLoggingMiddleware({ logger }));
  app.use(createDownloadRouter({ gate, logger }));
  app.use(createHealthRouter({ queue, slots, dispatcher }));

  dispatcher.start();

  return { app, queue, slots, dispatcher, gate, close: () => dispatcher.stop() };
}
