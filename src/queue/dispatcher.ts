import type { TransferOutcome } from '../file-serving/types.ts';
import { describeError } from '../lib/errors.ts';
import { createActionableError, type Logger } from '../types.ts';
import type { AdmissionQueue } from './admission-queue.ts';
import type { DownloadHandler, PendingRequest } from './types.ts';
import type { WorkerSlots } from './worker-slots.ts';

export interface DispatcherOptions {
  queue: AdmissionQueue<PendingRequest>;
  slots: WorkerSlots;
  handler: DownloadHandler;
  logger: Logger;
}

/**
 * Moves admitted requests from the queue onto worker slots
 *
 * A slot is taken before dequeuing, so while every slot is busy requests wait in
 * the queue (and new ones are refused once it is full). Each request runs behind
 * a fault barrier: its completion signal is written exactly once and its slot is
 * released whatever the handler does.
 */
export class Dispatcher {
  private readonly queue: AdmissionQueue<PendingRequest>;
  private readonly slots: WorkerSlots;
  private readonly handler: DownloadHandler;
  private readonly logger: Logger;
  private loop: Promise<void> | undefined;
  private readonly running = new Set<Promise<void>>();

  constructor({ queue, slots, handler, logger }: DispatcherOptions) {
    this.queue = queue;
    this.slots = slots;
    this.handler = handler;
    this.logger = logger;
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  /** Number of requests currently being transferred */
  inFlight(): number {
    return this.running.size;
  }

  /**
   * Stop admitting requests, let queued and in-flight ones finish, then resolve.
   */
  async stop(): Promise<void> {
    this.queue.close();
    if (this.loop) await this.loop;
    await Promise.all([...this.running]);
  }

  private async run(): Promise<void> {
    while (true) {
      await this.slots.acquire();
      const request = await this.queue.dequeue();
      if (!request) {
        this.slots.release();
        return;
      }

      const task = this.execute(request).finally(() => {
        this.running.delete(task);
        this.slots.release();
      });
      this.running.add(task);
    }
  }

  private async execute(request: PendingRequest): Promise<void> {
    let outcome: TransferOutcome;
    try {
      outcome = request.signal.aborted ? { type: 'cancelled', bytesWritten: 0 } : await this.handler(request);
    } catch (error) {
      this.logger.error(`Unexpected fault while serving ${request.fileName}:`, describeError(error));
      outcome = createActionableError('Internal server error', 'IO_ERROR');
      try {
        if (request.sink.headersSent) request.sink.destroy();
        else request.sink.sendError(500, 'Internal server error');
      } catch (sinkError) {
        this.logger.error(`Failed to report fault for ${request.fileName}:`, describeError(sinkError));
      }
    }
    request.completion.complete(outcome);
  }
}
