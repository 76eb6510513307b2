import type * as http from 'http';

export type Logger = Pick<Console, 'info' | 'error' | 'warn' | 'debug'>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Server configuration, usually produced by parseConfig() */
export interface ServerConfig {
  port: number;
  /** Directory files are served from; created on startup if absent */
  rootDir: string;
  /** Maximum number of requests waiting for a worker slot */
  queueCapacity: number;
  /** Maximum number of transfers running at the same time */
  workers: number;
  /** How long a caller waits (queued + transferring) before giving up */
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

export type ErrorCode = 'INVALID_INPUT' | 'PATH_ESCAPE' | 'NOT_FOUND' | 'IO_ERROR' | 'QUEUE_FULL' | 'TIMEOUT';

/**
 * Error branch type for discriminated union results
 */
export interface ErrorBranch {
  type: 'error';
  error: string;
  code: ErrorCode;
  help?: string;
  debug?: Record<string, unknown>;
}

/** Create actionable error branches with guidance */
export function createActionableError(error: string, code: ErrorCode, help?: string): ErrorBranch {
  const result: ErrorBranch = {
    type: 'error',
    error,
    code,
  };
  if (help !== undefined) result.help = help;
  return result;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INVALID_INPUT: 400,
  PATH_ESCAPE: 400,
  NOT_FOUND: 404,
  TIMEOUT: 408,
  IO_ERROR: 500,
  QUEUE_FULL: 503,
};

export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

export interface SetupHttpTransportResult {
  httpServer: http.Server;
  close: () => Promise<void>;
}
