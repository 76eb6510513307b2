import { type FileHandle, open } from 'fs/promises';
import * as path from 'path';
import { describeError, errorCode } from '../lib/errors.ts';
import { createActionableError, type ErrorBranch, type Logger, statusForCode } from '../types.ts';
import type { ResponseHeaders, TransferContext, TransferOptions, TransferOutcome, TransferSink } from './types.ts';

export const DEFAULT_CHUNK_SIZE = 32 * 1024;

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Headers for an attachment download. Printable ASCII names are quoted as-is
 * (with `"` and `\` escaped); anything else is percent-encoded so the header
 * stays valid.
 */
export function downloadHeaders(fileName: string, size: number): ResponseHeaders {
  const quoted = /^[\x20-\x7e]*$/.test(fileName) ? fileName.replace(/["\\]/g, '\\$&') : encodeURIComponent(fileName);
  return {
    'Content-Disposition': `attachment; filename="${quoted}"`,
    'Content-Type': 'application/octet-stream',
    'Content-Length': size,
    'Accept-Ranges': 'bytes',
  };
}

type OpenResult = { type: 'opened'; context: TransferContext } | ErrorBranch;

async function openForTransfer(filePath: string, displayName: string, logger: Logger): Promise<OpenResult> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (error) {
    const code = errorCode(error);
    if (code !== undefined && NOT_FOUND_CODES.has(code)) {
      return createActionableError('File not found', 'NOT_FOUND');
    }
    logger.error(`Failed to open ${displayName}:`, describeError(error));
    return createActionableError('Internal server error', 'IO_ERROR');
  }

  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      await handle.close();
      return createActionableError('File not found', 'NOT_FOUND');
    }
    return { type: 'opened', context: { path: filePath, handle, size: stats.size, bytesWritten: 0 } };
  } catch (error) {
    logger.error(`Failed to stat ${displayName}:`, describeError(error));
    await closeQuietly(handle, displayName, logger);
    return createActionableError('Internal server error', 'IO_ERROR');
  }
}

async function closeQuietly(handle: FileHandle, displayName: string, logger: Logger): Promise<void> {
  try {
    await handle.close();
  } catch (error) {
    logger.warn(`Failed to close ${displayName}:`, describeError(error));
  }
}

async function streamChunks(context: TransferContext, sink: TransferSink, signal: AbortSignal, chunkSize: number, displayName: string, logger: Logger): Promise<TransferOutcome> {
  while (context.bytesWritten < context.size) {
    if (signal.aborted) {
      logger.info(`Client disconnected during download of ${displayName}`);
      return { type: 'cancelled', bytesWritten: context.bytesWritten };
    }

    // Fresh buffer per chunk: the sink may still hold the previous one in its write queue.
    const buffer = Buffer.allocUnsafe(Math.min(chunkSize, context.size - context.bytesWritten));
    let bytesRead: number;
    try {
      ({ bytesRead } = await context.handle.read(buffer, 0, buffer.length, null));
    } catch (error) {
      logger.error(`Read error during download of ${displayName}:`, describeError(error));
      sink.destroy();
      return createActionableError('Internal server error', 'IO_ERROR');
    }

    if (bytesRead === 0) {
      logger.error(`Read error during download of ${displayName}: file shrank to ${context.bytesWritten} of ${context.size} bytes`);
      sink.destroy();
      return createActionableError('Internal server error', 'IO_ERROR');
    }

    if (signal.aborted) {
      logger.info(`Client disconnected during download of ${displayName}`);
      return { type: 'cancelled', bytesWritten: context.bytesWritten };
    }

    try {
      await sink.write(buffer.subarray(0, bytesRead), signal);
    } catch (error) {
      logger.debug(`Write error during download of ${displayName}:`, describeError(error));
      return { type: 'aborted', bytesWritten: context.bytesWritten, error: error instanceof Error ? error.message : String(error) };
    }

    context.bytesWritten += bytesRead;
    sink.flush?.();
  }

  if (signal.aborted) {
    logger.info(`Client disconnected during download of ${displayName}`);
    return { type: 'cancelled', bytesWritten: context.bytesWritten };
  }

  sink.end();
  return { type: 'completed', bytesWritten: context.bytesWritten };
}

/**
 * Stream a file that has already passed path resolution to a sink
 *
 * Headers go out exactly once, before the first body byte. The cancel signal is
 * checked before headers and before and after every read, so a cancelled
 * transfer stops within one chunk. Failures found before headers are committed
 * are answered on the sink (404 / 500); later ones terminate the response.
 * Never rejects: unexpected faults come back as an IO_ERROR outcome.
 */
export async function transferFile(resolvedPath: string, sink: TransferSink, signal: AbortSignal, options: TransferOptions): Promise<TransferOutcome> {
  const { logger, chunkSize = DEFAULT_CHUNK_SIZE } = options;
  const displayName = options.displayName ?? path.basename(resolvedPath);
  const startTime = Date.now();
  let context: TransferContext | undefined;

  try {
    if (signal.aborted) return { type: 'cancelled', bytesWritten: 0 };

    const opened = await openForTransfer(resolvedPath, displayName, logger);
    if (opened.type === 'error') {
      if (!signal.aborted) sink.sendError(statusForCode(opened.code), opened.error);
      return opened;
    }
    context = opened.context;

    if (signal.aborted) return { type: 'cancelled', bytesWritten: 0 };
    sink.sendHeaders(downloadHeaders(displayName, context.size));

    const outcome = await streamChunks(context, sink, signal, chunkSize, displayName, logger);
    if (outcome.type === 'completed') {
      logger.info(`Completed download request for ${displayName} (${outcome.bytesWritten} bytes) in ${Date.now() - startTime}ms`);
    }
    return outcome;
  } catch (error) {
    logger.error(`Unexpected error during download of ${displayName}:`, describeError(error));
    if (sink.headersSent) {
      sink.destroy();
    } else {
      sink.sendError(500, 'Internal server error');
    }
    return createActionableError('Internal server error', 'IO_ERROR');
  } finally {
    if (context) await closeQuietly(context.handle, displayName, logger);
  }
}
