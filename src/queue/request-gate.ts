import type { TransferOutcome, TransferSink } from '../file-serving/types.ts';
import { createActionableError, type Logger, statusForCode } from '../types.ts';
import type { AdmissionQueue } from './admission-queue.ts';
import { CompletionSignal } from './completion-signal.ts';
import type { PendingRequest } from './types.ts';

/** 20 minutes: large files can legitimately take a long time */
export const DEFAULT_REQUEST_TIMEOUT_MS = 20 * 60 * 1000;

export interface RequestGateOptions {
  queue: AdmissionQueue<PendingRequest>;
  logger: Logger;
  /** @default DEFAULT_REQUEST_TIMEOUT_MS */
  timeoutMs?: number;
}

export interface GateResult {
  outcome: TransferOutcome;
  /** Status the client saw, or null when nothing could be delivered */
  status: number | null;
}

/**
 * HTTP status corresponding to an outcome. Completed and aborted transfers had
 * already committed a 200 before any body byte was written.
 */
export function statusForOutcome(outcome: TransferOutcome): number | null {
  switch (outcome.type) {
    case 'completed':
    case 'aborted':
      return 200;
    case 'cancelled':
      return null;
    case 'error':
      return statusForCode(outcome.code);
  }
}

function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Caller-facing entry point: admit, wait, report
 *
 * A full queue is answered with 503 at once. Otherwise the caller waits for the
 * transfer's completion signal or its deadline. Client disconnect and deadline
 * share one AbortController, so a deadline stops the transfer (or skips it if
 * it is still queued) the same way a disconnect does.
 */
export class RequestGate {
  private readonly queue: AdmissionQueue<PendingRequest>;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor({ queue, logger, timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS }: RequestGateOptions) {
    this.queue = queue;
    this.logger = logger;
    this.timeoutMs = timeoutMs;
  }

  /**
   * @param requestTarget - Original request target, used in log lines
   */
  async handle(fileName: string, sink: TransferSink, inboundSignal: AbortSignal, requestTarget = fileName): Promise<GateResult> {
    if (inboundSignal.aborted) {
      return { outcome: { type: 'cancelled', bytesWritten: 0 }, status: null };
    }

    const controller = new AbortController();
    const onInboundAbort = () => controller.abort(inboundSignal.reason);
    inboundSignal.addEventListener('abort', onInboundAbort, { once: true });

    const request: PendingRequest = { fileName, sink, signal: controller.signal, completion: new CompletionSignal<TransferOutcome>() };

    if (!this.queue.tryEnqueue(request)) {
      inboundSignal.removeEventListener('abort', onInboundAbort);
      sink.sendError(503, 'Server busy, please try again later');
      return { outcome: createActionableError('Server busy, please try again later', 'QUEUE_FULL', 'Retry after a short delay'), status: 503 };
    }

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error('Request timeout'));
    }, this.timeoutMs);

    try {
      const outcome = await Promise.race([request.completion.wait(), whenAborted(controller.signal).then(() => undefined)]);
      // A transfer that stopped because this gate aborted it is reported by the gate
      if (outcome && !(outcome.type === 'cancelled' && controller.signal.aborted)) {
        return { outcome, status: statusForOutcome(outcome) };
      }

      if (timedOut) {
        this.logger.warn(`Request timeout for ${requestTarget}`);
        if (sink.headersSent) sink.destroy();
        else sink.sendError(408, 'Request timeout');
        return { outcome: createActionableError('Request timeout', 'TIMEOUT'), status: 408 };
      }

      this.logger.info(`Request cancelled for ${requestTarget}`);
      return { outcome: { type: 'cancelled', bytesWritten: 0 }, status: null };
    } finally {
      clearTimeout(timer);
      inboundSignal.removeEventListener('abort', onInboundAbort);
    }
  }
}
