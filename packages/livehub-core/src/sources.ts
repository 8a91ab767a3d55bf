import { createLogger } from '@livehub/observability';
import { BroadcastHub } from './broadcastHub.js';
import { toError } from './errors.js';
import type { HubOptions } from './types.js';

const logger = createLogger('HubSources');

export interface SourceListener<T> {
  next(value: T): void;
  complete(): void;
  error(error: unknown): void;
}

export type Unsubscribe = () => void;

/**
 * Wrap a listener-style API. Each `next` callback is a push; `complete` and
 * `error` end the hub. The returned unsubscribe runs when the hub terminates.
 *
 * ```typescript
 * const hub = fromCallbackSource<Quote>((listener) => {
 *   feed.on('quote', listener.next);
 *   feed.on('end', listener.complete);
 *   return () => feed.removeAllListeners();
 * }, { name: 'quotes' });
 * ```
 */
export function fromCallbackSource<T>(
  subscribe: (listener: SourceListener<T>) => Unsubscribe | void,
  options: HubOptions = {},
): BroadcastHub<T> {
  return BroadcastHub.fromSource<T>((inlet) => {
    return subscribe({
      next: (value) => {
        if (inlet.closed) return;
        inlet.push(value);
      },
      complete: () => {
        if (inlet.closed) return;
        inlet.complete();
      },
      error: (error) => {
        if (inlet.closed) return;
        inlet.fail(error);
      },
    });
  }, options);
}

/**
 * Pump an async iterable into a hub. The pump waits on `inlet.ready()` before every
 * push, so a `block-producer` hub slows the iterable down instead of buffering
 * without bound.
 * Exhaustion completes the hub, a throw fails it, and hub termination stops the
 * pump and closes the iterator.
 */
export function fromAsyncIterable<T>(iterable: AsyncIterable<T>, options: HubOptions = {}): BroadcastHub<T> {
  return BroadcastHub.fromSource<T>((inlet) => {
    const iterator = iterable[Symbol.asyncIterator]();
    let stopped = false;

    const pump = async (): Promise<void> => {
      try {
        for (;;) {
          const result = await iterator.next();
          if (stopped || inlet.closed) return;
          if (result.done) {
            inlet.complete();
            return;
          }

          await inlet.ready();
          if (stopped || inlet.closed) return;
          inlet.push(result.value);
        }
      } catch (error) {
        if (!stopped && !inlet.closed) {
          inlet.fail(error);
        }
      }
    };

    void pump().catch((error: unknown) => {
      logger.error({ err: toError(error) }, 'Async iterable pump failed');
    });

    return () => {
      if (stopped) return;
      stopped = true;
      if (iterator.return) {
        void Promise.resolve(iterator.return()).catch((error: unknown) => {
          logger.warn({ err: toError(error) }, 'Error closing async iterator');
        });
      }
    };
  }, options);
}
