import type { TransferOutcome, TransferSink } from '../file-serving/types.ts';
import type { CompletionSignal } from './completion-signal.ts';

/**
 * One admitted download, from enqueue until its completion signal fires
 */
export interface PendingRequest {
  /** Raw, untrusted name from the query string */
  fileName: string;
  sink: TransferSink;
  /** Fires on client disconnect or when the caller's deadline passes */
  signal: AbortSignal;
  completion: CompletionSignal<TransferOutcome>;
}

export type DownloadHandler = (request: PendingRequest) => Promise<TransferOutcome>;
