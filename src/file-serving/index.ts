/**
 * File serving pipeline
 *
 * - `resolveRequestPath()` - validate an untrusted name against the root directory
 * - `transferFile()` - stream a resolved file to a TransferSink in fixed-size chunks
 * - `createResponseSink()` - TransferSink over a Node/Express response
 * - `createDownloadTask()` - resolve + transfer, as run by the dispatcher
 * - `createDownloadRouter()` / `createHealthRouter()` - Express routes
 *
 * @module file-serving
 *
 * @example
 * import { createResponseSink, resolveRequestPath, transferFile } from './file-serving/index.ts';
 *
 * const resolved = await resolveRequestPath('/srv/files', fileName);
 * if (resolved.type === 'resolved') {
 *   await transferFile(resolved.path, createResponseSink(res), controller.signal, { logger });
 * }
 */

export * from './download-task.ts';
export * from './response-sink.ts';
export * from './router.ts';
export * from './transfer.ts';
export * from './types.ts';
export * from './utils.ts';
