import { BroadcastHub } from './broadcastHub.js';
import type { Stage } from './stages.js';
import type { HubOptions } from './types.js';

/**
 * Build a hub fed by a transformation of another hub
 *
 * The derived hub holds exactly one inline tap on the source, so `stage` runs once
 * per source element no matter how many consumers attach to the derived hub.
 * Derived hubs are ordinary hubs and can themselves be derived from.
 *
 * - A stage that throws fails the derived hub only; the source keeps running.
 * - Source completion flushes the stage, then completes the derived hub.
 * - Source failure fails the derived hub.
 * - Terminating the derived hub detaches it from the source.
 *
 * ```typescript
 * const prices = deriveHub(ticks, mapStage((tick: Tick) => tick.price));
 * const averages = deriveHub(prices, slidingWindow(20));
 * ```
 */
export function deriveHub<T, U>(
  source: BroadcastHub<T>,
  stage: Stage<T, U>,
  options: HubOptions = {},
): BroadcastHub<U> {
  return BroadcastHub.fromSource<U>(
    (inlet) => {
      const emit = (value: U): void => {
        inlet.push(value);
      };

      return source.tap({
        next(value) {
          if (inlet.closed) return;
          try {
            stage.process(value, emit);
          } catch (error) {
            inlet.fail(error);
          }
        },
        complete() {
          if (inlet.closed) return;
          try {
            stage.flush?.(emit);
          } catch (error) {
            inlet.fail(error);
            return;
          }
          inlet.complete();
        },
        error(error) {
          if (inlet.closed) return;
          inlet.fail(error);
        },
      });
    },
    { ...options, name: options.name ?? `${source.name}:derived` },
  );
}
