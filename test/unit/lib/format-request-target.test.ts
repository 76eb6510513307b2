import assert from 'assert';
import { formatRequestTarget } from '../../../src/lib/format-request-target.ts';

describe('lib/format-request-target', () => {
  it('keeps path and query as they are when nothing is secret', () => {
    assert.strictEqual(formatRequestTarget('/download?file=report.pdf'), '/download?file=report.pdf');
  });

  it('redacts secret parameters', () => {
    assert.strictEqual(formatRequestTarget('/download?file=report.pdf&token=test-secret'), '/download?file=report.pdf&token=***');
    assert.strictEqual(formatRequestTarget('/download?api_key=abc&file=a.txt'), '/download?api_key=***&file=a.txt');
  });

  it('redacts every secret parameter present', () => {
    assert.strictEqual(formatRequestTarget('/health?password=pw1&secret=s'), '/health?password=***&secret=***');
  });

  it('handles targets without a query', () => {
    assert.strictEqual(formatRequestTarget('/health'), '/health');
  });

  it('strips the origin from absolute URLs', () => {
    assert.strictEqual(formatRequestTarget('http://example.com/download?file=a.txt'), '/download?file=a.txt');
  });
});
