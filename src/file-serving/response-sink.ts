import type * as http from 'http';
import type { ResponseHeaders, TransferSink } from './types.ts';

// Set by compression-style middleware that buffers writes
function hasFlush(res: http.ServerResponse): res is http.ServerResponse & { flush: () => void } {
  return 'flush' in res && typeof res.flush === 'function';
}

/**
 * Adapt a Node/Express response to the TransferSink used by transferFile()
 */
export function createResponseSink(res: http.ServerResponse): TransferSink {
  const sink: TransferSink = {
    get headersSent() {
      return res.headersSent;
    },

    sendHeaders(headers: ResponseHeaders) {
      res.writeHead(200, headers);
      res.flushHeaders();
    },

    write(chunk: Uint8Array, signal?: AbortSignal) {
      if (res.destroyed || res.writableEnded) {
        return Promise.reject(new Error('Response is no longer writable'));
      }

      return new Promise<void>((resolve, reject) => {
        let settled = false;
        const settle = (error?: Error) => {
          if (settled) return;
          settled = true;
          res.off('drain', onDrain);
          res.off('close', onClose);
          res.off('error', onError);
          signal?.removeEventListener('abort', onAbort);
          if (error) reject(error);
          else resolve();
        };
        const onDrain = () => settle();
        const onClose = () => settle(new Error('Connection closed before the chunk was written'));
        const onError = (error: Error) => settle(error);
        const onAbort = () => settle();

        const accepted = res.write(chunk, (error) => {
          if (error) settle(error);
        });
        if (accepted) {
          settle();
          return;
        }

        res.once('drain', onDrain);
        res.once('close', onClose);
        res.once('error', onError);
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    },

    end() {
      res.end();
    },

    sendError(status: number, message: string) {
      if (res.headersSent || res.destroyed) return;
      res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8', 'X-Content-Type-Options': 'nosniff' });
      res.end(message);
    },

    destroy() {
      res.destroy();
    },
  };

  if (hasFlush(res)) sink.flush = () => res.flush();
  return sink;
}
