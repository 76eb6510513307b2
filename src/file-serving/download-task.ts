import * as path from 'path';
import type { DownloadHandler } from '../queue/types.ts';
import { type Logger, statusForCode } from '../types.ts';
import { transferFile } from './transfer.ts';
import { resolveRequestPath } from './utils.ts';

export interface DownloadTaskOptions {
  rootDir: string;
  logger: Logger;
  chunkSize?: number;
}

/**
 * Build the handler the dispatcher runs for each admitted request:
 * resolve the name under the root, then stream the file.
 */
export function createDownloadTask({ rootDir, logger, chunkSize }: DownloadTaskOptions): DownloadHandler {
  return async ({ fileName, sink, signal }) => {
    const resolved = await resolveRequestPath(rootDir, fileName);
    if (resolved.type === 'error') {
      if (resolved.code === 'PATH_ESCAPE') logger.warn(`Rejected path outside download directory: ${JSON.stringify(fileName)}`);
      if (!signal.aborted) sink.sendError(statusForCode(resolved.code), resolved.error);
      return resolved;
    }

    return transferFile(resolved.path, sink, signal, { logger, chunkSize, displayName: path.basename(fileName) });
  };
}
