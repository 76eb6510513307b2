// File serving pipeline
export * from './file-serving/index.ts';
// Shared helpers
export { createLogger } from './lib/create-logger.ts';
export { ensureRootDir } from './lib/ensure-root-dir.ts';
export { formatRequestTarget } from './lib/format-request-target.ts';
// Middleware
export * from './middleware/logging.ts';
// Admission control and dispatch
export * from './queue/admission-queue.ts';
export * from './queue/completion-signal.ts';
export * from './queue/dispatcher.ts';
export * from './queue/request-gate.ts';
export type { DownloadHandler, PendingRequest } from './queue/types.ts';
export * from './queue/worker-slots.ts';
// Server assembly
export * from './server.ts';
// Transports
export * from './transports/http.ts';
export { DEFAULT_CONFIG, parseConfig } from './transports/parse-config.ts';
// Core types and utilities
export * from './types.ts';
