import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../queue/request-gate.ts';
import type { ServerConfig } from '../types.ts';

export const DEFAULT_CONFIG: ServerConfig = {
  port: 8080,
  rootDir: 'files',
  queueCapacity: 1000,
  workers: 100,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  logLevel: 'info',
};

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  rootDir: z.string().min(1),
  queueCapacity: z.coerce.number().int().positive(),
  workers: z.coerce.number().int().positive(),
  requestTimeoutMs: z.coerce.number().int().positive(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

function pick(...candidates: unknown[]): unknown {
  return candidates.find((value) => typeof value === 'string' && value !== '');
}

/**
 * Parse server configuration from CLI arguments and environment variables.
 *
 * | Flag           | Env                | Default    |
 * |----------------|--------------------|------------|
 * | --port         | PORT               | 8080       |
 * | --root         | DOWNLOAD_DIR       | files      |
 * | --queue-size   | QUEUE_SIZE         | 1000       |
 * | --workers      | MAX_WORKERS        | 100        |
 * | --timeout (ms) | REQUEST_TIMEOUT_MS | 1200000    |
 * | --log-level    | LOG_LEVEL          | info       |
 *
 * CLI flags override environment variables.
 *
 * @param args - CLI arguments array (REQUIRED - no default, typically process.argv.slice(2))
 * @param env - Environment variables object (REQUIRED - no default, typically process.env)
 * @throws Error describing every invalid value
 *
 * @example
 * parseConfig(['--port=3000', '--workers=8'], { DOWNLOAD_DIR: '/srv/files' })
 * // => { port: 3000, rootDir: '/srv/files', workers: 8, queueCapacity: 1000, ... }
 */
export function parseConfig(args: string[], env: Record<string, string | undefined>): ServerConfig {
  const { values } = parseArgs({
    args,
    options: {
      port: { type: 'string' },
      root: { type: 'string' },
      'queue-size': { type: 'string' },
      workers: { type: 'string' },
      timeout: { type: 'string' },
      'log-level': { type: 'string' },
    },
    strict: false,
    allowPositionals: true,
  });

  const parsed = configSchema.safeParse({
    port: pick(values.port, env.PORT) ?? DEFAULT_CONFIG.port,
    rootDir: pick(values.root, env.DOWNLOAD_DIR) ?? DEFAULT_CONFIG.rootDir,
    queueCapacity: pick(values['queue-size'], env.QUEUE_SIZE) ?? DEFAULT_CONFIG.queueCapacity,
    workers: pick(values.workers, env.MAX_WORKERS) ?? DEFAULT_CONFIG.workers,
    requestTimeoutMs: pick(values.timeout, env.REQUEST_TIMEOUT_MS) ?? DEFAULT_CONFIG.requestTimeoutMs,
    logLevel: pick(values['log-level'], env.LOG_LEVEL) ?? DEFAULT_CONFIG.logLevel,
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return parsed.data;
}
