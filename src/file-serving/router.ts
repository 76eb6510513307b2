import express, { type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import { describeError } from '../lib/errors.ts';
import { formatRequestTarget } from '../lib/format-request-target.ts';
import type { Dispatcher } from '../queue/dispatcher.ts';
import type { AdmissionQueue } from '../queue/admission-queue.ts';
import type { RequestGate } from '../queue/request-gate.ts';
import type { PendingRequest } from '../queue/types.ts';
import type { WorkerSlots } from '../queue/worker-slots.ts';
import type { Logger } from '../types.ts';
import { createResponseSink } from './response-sink.ts';

// Repeated ?file= parameters take the first value; nested objects are rejected
const downloadQuerySchema = z.object({
  file: z
    .union([z.string(), z.array(z.string()).nonempty()])
    .optional()
    .transform((value) => (Array.isArray(value) ? value[0] : (value ?? ''))),
});

export interface DownloadRouterOptions {
  gate: RequestGate;
  logger: Logger;
}

/**
 * Express router exposing `GET /download?file=<name>`
 *
 * Responses:
 * - 200 with the file as an attachment
 * - 400 missing, malformed or escaping name
 * - 404 no such file
 * - 408 caller deadline passed
 * - 500 I/O failure
 * - 503 admission queue full
 */
export function createDownloadRouter({ gate, logger }: DownloadRouterOptions): Router {
  const router = express.Router();

  router.get('/download', async (req: Request, res: Response) => {
    const target = formatRequestTarget(req.originalUrl);
    try {
      const query = downloadQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).type('text/plain').send('Invalid file parameter');
        return;
      }

      logger.info(`Starting download request for ${target}`);

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) controller.abort(new Error('Client disconnected'));
      });

      const { outcome, status } = await gate.handle(query.data.file, createResponseSink(res), controller.signal, target);
      logger.debug(`Download request for ${target} finished: ${outcome.type}${status === null ? '' : ` (${status})`}`);
    } catch (error) {
      logger.error(`Error handling download request for ${target}:`, describeError(error));
      if (!res.headersSent) {
        res.status(500).type('text/plain').send('Internal server error');
      }
    }
  });

  return router;
}

export interface HealthRouterOptions {
  queue: AdmissionQueue<PendingRequest>;
  slots: WorkerSlots;
  dispatcher: Dispatcher;
}

/** `GET /health` reporting slot count, queue depth and transfers in flight */
export function createHealthRouter({ queue, slots, dispatcher }: HealthRouterOptions): Router {
  const router = express.Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      workers: slots.size,
      queue_size: queue.depth(),
      in_flight: dispatcher.inFlight(),
    });
  });

  return router;
}
