import type { Writable } from 'node:stream';
import { finished as streamFinished } from 'node:stream/promises';

import { ioError } from '../diagnostics/errors.js';
import type { TextSink } from './types.js';

/**
 * {@link TextSink} over a Node `Writable`.
 *
 * `write()` only queues text; `drain()` hands it to the stream and honours back-pressure. The sink owns
 * the stream's lifetime once `end()` is called.
 */
export interface StreamSink extends TextSink {
  drain(): Promise<void>;
  /** End the stream. Only the first call has an effect. */
  end(): void;
  /** Resolve once the ended stream has finished; reject with an `IoError` if writing failed. */
  finished(): Promise<void>;
}

function waitForDrain(out: Writable): Promise<void> {
  return new Promise((resolve, reject) => {
    const settle = (err?: Error): void => {
      out.off('drain', onDrain);
      out.off('error', onError);
      out.off('close', onClose);
      if (err) reject(err);
      else resolve();
    };
    const onDrain = (): void => settle();
    const onError = (err: Error): void => settle(err);
    const onClose = (): void => settle(new Error('output closed before it drained'));
    out.on('drain', onDrain);
    out.on('error', onError);
    out.on('close', onClose);
  });
}

export function createStreamSink(out: Writable): StreamSink {
  let queued: string[] = [];
  let ended = false;
  // A write failure can surface between drains (e.g. EPIPE once the reader exits); keep the first one
  // and report it from the next drain() or finished().
  let failure: Error | undefined;
  out.on('error', (err: Error) => {
    failure ??= err;
  });
  const failed = (): Error | undefined => failure ?? out.errored ?? undefined;

  return {
    write(text: string): void {
      queued.push(text);
    },

    async drain(): Promise<void> {
      while (queued.length > 0) {
        const err = failed();
        if (err) throw ioError('write', err);
        if (out.destroyed || out.writableEnded) {
          throw ioError('write', new Error('output is already closed'));
        }
        const chunk = queued.join('');
        queued = [];
        if (!out.write(chunk)) {
          try {
            await waitForDrain(out);
          } catch (drainErr) {
            throw ioError('write', failed() ?? drainErr);
          }
        }
      }
      const err = failed();
      if (err) throw ioError('write', err);
    },

    end(): void {
      if (ended) return;
      ended = true;
      out.end();
    },

    async finished(): Promise<void> {
      const err = failed();
      if (err) throw ioError('write', err);
      try {
        await streamFinished(out, { readable: false });
      } catch (finishErr) {
        throw ioError('write', failed() ?? finishErr);
      }
    },
  };
}
