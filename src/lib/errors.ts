/** errno-style code of a Node error (`ENOENT`, `EPIPE`, ...), if it has one */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/** Shape an unknown thrown value for structured logging */
export function describeError(error: unknown): Record<string, unknown> {
  return error instanceof Error ? { message: error.message, stack: error.stack } : { error: String(error) };
}
