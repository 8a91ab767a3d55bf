import type { LiveHubError } from './errors.js';
import type { DeliveryTarget, HubSink, OfferResult } from './types.js';

/**
 * Adapts an inline `HubSink` to the hub's delivery contract
 *
 * Sinks have no buffer: `next` runs on the producer's `push`, so a sink never
 * overflows. A throwing `next` is caught by the hub and detaches the sink.
 */
export class SinkTarget<T> implements DeliveryTarget<T> {
  readonly kind = 'sink' as const;
  readonly capacity = Number.POSITIVE_INFINITY;
  private done = false;

  constructor(
    readonly id: string,
    private readonly sink: HubSink<T>,
  ) {}

  offer(value: T): OfferResult {
    if (!this.done) {
      this.sink.next(value);
    }
    return 'accepted';
  }

  isSaturated(): boolean {
    return false;
  }

  end(): void {
    if (this.done) return;
    this.done = true;
    this.sink.complete?.();
  }

  fail(error: LiveHubError): void {
    if (this.done) return;
    this.done = true;
    this.sink.error?.(error);
  }

  release(): void {
    this.done = true;
  }
}
