import type { FileHandle } from 'fs/promises';
import type { ErrorBranch, Logger } from '../types.ts';

export type ResponseHeaders = Record<string, string | number>;

/**
 * Where a transfer writes its response.
 *
 * Headers are committed with sendHeaders() exactly once; write() must not be
 * called before that. sendError() is only meaningful while headersSent is false.
 */
export interface TransferSink {
  readonly headersSent: boolean;
  sendHeaders(headers: ResponseHeaders): void;
  /**
   * Resolves once the chunk has been accepted, waiting for drain when the sink
   * is backed up. Resolves early if `signal` fires while waiting. Rejects when
   * the sink can no longer be written to.
   */
  write(chunk: Uint8Array, signal?: AbortSignal): Promise<void>;
  /** Push buffered bytes to the receiver. Optional: not every sink buffers. */
  flush?(): void;
  end(): void;
  sendError(status: number, message: string): void;
  /** Terminate the response without completing it */
  destroy(): void;
}

/**
 * Result of one transfer attempt
 * - completed: every byte of the file reached the sink
 * - cancelled: the cancel signal fired; nothing more was read or written
 * - aborted: the sink failed mid-transfer (usually the client went away)
 * - error: see ErrorBranch.code
 */
export type TransferOutcome =
  | { type: 'completed'; bytesWritten: number }
  | { type: 'cancelled'; bytesWritten: number }
  | { type: 'aborted'; bytesWritten: number; error: string }
  | ErrorBranch;

export type ResolvedPath = { type: 'resolved'; path: string } | ErrorBranch;

export interface TransferOptions {
  logger: Logger;
  /** @default 32768 */
  chunkSize?: number;
  /** Name used in logs and error messages; defaults to the path's base name */
  displayName?: string;
}

/**
 * State of one in-progress transfer. Owned by a single transferFile() call.
 */
export interface TransferContext {
  path: string;
  handle: FileHandle;
  size: number;
  bytesWritten: number;
}
