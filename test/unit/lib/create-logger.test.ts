import assert from 'assert';
import { createLogger } from '../../../src/lib/create-logger.ts';
import { createCaptureLogger } from '../../lib/logger.ts';

describe('lib/create-logger', () => {
  it('passes through messages at or above the level', () => {
    const output = createCaptureLogger();
    const logger = createLogger('warn', output);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    assert.deepStrictEqual(output.lines, [
      { level: 'warn', message: 'w' },
      { level: 'error', message: 'e' },
    ]);
  });

  it('passes everything through at debug', () => {
    const output = createCaptureLogger();
    const logger = createLogger('debug', output);

    logger.debug('d');
    logger.info('i');

    assert.deepStrictEqual(
      output.lines.map((line) => line.level),
      ['debug', 'info']
    );
  });

  it('drops everything when silent', () => {
    const output = createCaptureLogger();
    const logger = createLogger('silent', output);

    logger.error('e');

    assert.deepStrictEqual(output.lines, []);
  });
});
