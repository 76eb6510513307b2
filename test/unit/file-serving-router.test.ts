import assert from 'assert';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import request from 'supertest';
import { createDownloadServer, type DownloadServer } from '../../src/server.ts';
import { type CapturedLine, createCaptureLogger } from '../lib/logger.ts';

describe('download and health routes', () => {
  let baseDir: string;
  let rootDir: string;
  let server: DownloadServer;
  let lines: CapturedLine[];

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'router-test-'));
    rootDir = join(baseDir, 'files');
    mkdirSync(rootDir);
    writeFileSync(join(rootDir, 'notes.txt'), 'hello world');
    writeFileSync(join(baseDir, 'secret.txt'), 'do not serve');

    const logger = createCaptureLogger();
    lines = logger.lines;
    server = createDownloadServer({ rootDir, queueCapacity: 10, workers: 3, requestTimeoutMs: 5000 }, { logger });
  });

  afterEach(async () => {
    await server.close();
    rmSync(baseDir, { recursive: true, force: true });
  });

  describe('GET /download', () => {
    it('serves a file with attachment headers', async () => {
      await request(server.app)
        .get('/download?file=notes.txt')
        .expect(200)
        .expect('Content-Disposition', 'attachment; filename="notes.txt"')
        .expect('Content-Type', 'application/octet-stream')
        .expect('Content-Length', '11')
        .expect('Accept-Ranges', 'bytes');
    });

    it('exposes download headers to browsers', async () => {
      await request(server.app).get('/download?file=notes.txt').expect(200).expect('Access-Control-Allow-Origin', '*').expect('Access-Control-Expose-Headers', 'Content-Disposition,Content-Length');
    });

    it('returns 400 for an empty file name', async () => {
      await request(server.app).get('/download?file=').expect(400, 'File name is required');
    });

    it('returns 400 when the file parameter is missing', async () => {
      await request(server.app).get('/download').expect(400, 'File name is required');
    });

    it('returns 400 for a malformed file parameter', async () => {
      await request(server.app).get('/download?file[name]=notes.txt').expect(400, 'Invalid file parameter');
    });

    it('uses the first of repeated file parameters', async () => {
      await request(server.app).get('/download?file=notes.txt&file=other.txt').expect(200).expect('Content-Length', '11');
    });

    it('returns 400 for traversal outside the root and logs the attempt', async () => {
      await request(server.app).get('/download?file=../secret.txt').expect(400, 'Invalid file path');

      assert.ok(lines.some((line) => line.level === 'warn' && line.message === 'Rejected path outside download directory: "../secret.txt"'));
    });

    it('returns 400 for an encoded traversal', async () => {
      await request(server.app).get('/download?file=%2E%2E%2Fsecret.txt').expect(400, 'Invalid file path');
    });

    it('returns 404 for a missing file', async () => {
      await request(server.app).get('/download?file=missing.pdf').expect(404, 'File not found');
    });

    it('logs the request target with secrets redacted', async () => {
      await request(server.app).get('/download?file=notes.txt&token=test-secret').expect(200);

      assert.ok(lines.some((line) => line.level === 'info' && line.message === 'Starting download request for /download?file=notes.txt&token=***'));
    });
  });

  describe('GET /health', () => {
    it('reports worker count, queue depth and transfers in flight', async () => {
      const response = await request(server.app).get('/health').expect(200).expect('Content-Type', /application\/json/);

      assert.deepStrictEqual(response.body, { status: 'ok', workers: 3, queue_size: 0, in_flight: 0 });
    });
  });
});
