import assert from 'assert';
import { DEFAULT_CONFIG, parseConfig } from '../../../src/transports/parse-config.ts';

describe('transports/parse-config', () => {
  describe('parseConfig()', () => {
    it('returns the defaults with no args or env', () => {
      assert.deepStrictEqual(parseConfig([], {}), {
        port: 8080,
        rootDir: 'files',
        queueCapacity: 1000,
        workers: 100,
        requestTimeoutMs: 1_200_000,
        logLevel: 'info',
      });
    });

    it('reads every CLI flag', () => {
      const config = parseConfig(['--port=3000', '--root=/srv/files', '--queue-size=50', '--workers=8', '--timeout=60000', '--log-level=debug'], {});

      assert.deepStrictEqual(config, {
        port: 3000,
        rootDir: '/srv/files',
        queueCapacity: 50,
        workers: 8,
        requestTimeoutMs: 60_000,
        logLevel: 'debug',
      });
    });

    it('reads environment variables', () => {
      const config = parseConfig([], { PORT: '9000', DOWNLOAD_DIR: 'downloads', QUEUE_SIZE: '20', MAX_WORKERS: '4', REQUEST_TIMEOUT_MS: '1000', LOG_LEVEL: 'warn' });

      assert.deepStrictEqual(config, {
        port: 9000,
        rootDir: 'downloads',
        queueCapacity: 20,
        workers: 4,
        requestTimeoutMs: 1000,
        logLevel: 'warn',
      });
    });

    it('prefers CLI flags over environment variables', () => {
      const config = parseConfig(['--port=3000'], { PORT: '9000' });

      assert.strictEqual(config.port, 3000);
    });

    it('ignores empty environment values', () => {
      const config = parseConfig([], { PORT: '', DOWNLOAD_DIR: '' });

      assert.strictEqual(config.port, DEFAULT_CONFIG.port);
      assert.strictEqual(config.rootDir, DEFAULT_CONFIG.rootDir);
    });

    it('ignores unknown flags and positionals', () => {
      const config = parseConfig(['serve', '--verbose', '--workers=2'], {});

      assert.strictEqual(config.workers, 2);
    });

    it('rejects a non-numeric port', () => {
      assert.throws(() => parseConfig(['--port=http'], {}), /Invalid configuration: port:/);
    });

    it('rejects a zero queue size', () => {
      assert.throws(() => parseConfig([], { QUEUE_SIZE: '0' }), /Invalid configuration: queueCapacity:/);
    });

    it('rejects an unknown log level', () => {
      assert.throws(() => parseConfig(['--log-level=loud'], {}), /Invalid configuration: logLevel:/);
    });
  });
});
