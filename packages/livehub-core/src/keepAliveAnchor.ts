import type { DeliveryTarget, OfferResult } from './types.js';

/**
 * Permanent null consumer attached to a hub at construction
 *
 * A hub whose lifetime followed its subscriber count would tear itself down the
 * moment the last reader left, taking the producer with it. The anchor keeps the
 * registry non-empty, so the hub lives until its owner shuts it down or the
 * producer ends. Everything it receives is discarded.
 */
export class KeepAliveAnchor<T> implements DeliveryTarget<T> {
  readonly kind = 'anchor' as const;
  readonly capacity = Number.POSITIVE_INFINITY;

  constructor(readonly id: string) {}

  offer(_value: T): OfferResult {
    return 'accepted';
  }

  isSaturated(): boolean {
    return false;
  }

  end(): void {}

  fail(): void {}

  release(): void {}
}
