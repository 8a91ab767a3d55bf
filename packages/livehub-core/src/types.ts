/**
 * Core types for the live broadcast hub
 */

import type { HubFailedError, LiveHubError } from './errors.js';

/**
 * Rule applied when a subscription's buffer is full and a new element arrives
 *
 * - `fail-fast`: the whole hub fails
 * - `drop-newest`: the incoming element is discarded for that subscription
 * - `drop-oldest`: the oldest buffered element is discarded for that subscription
 * - `block-producer`: the element is kept; the inlet reports saturation until the
 *   subscription drains
 */
export type OverflowPolicy = 'fail-fast' | 'drop-newest' | 'drop-oldest' | 'block-producer';

export const OVERFLOW_POLICIES = ['fail-fast', 'drop-newest', 'drop-oldest', 'block-producer'] as const;

export type HubState = 'created' | 'running' | 'completed' | 'failed';

/**
 * Why a hub stopped
 *
 * - `producer`: the inlet completed or failed
 * - `shutdown`: the owner tore the hub down
 * - `overflow`: a subscription overflowed under `fail-fast`
 * - `idle`: the last target detached while no keep-alive anchor was attached
 */
export type TerminationReason = 'producer' | 'shutdown' | 'overflow' | 'idle';

export type HubOutcome =
  | { state: 'completed'; reason: TerminationReason }
  | { state: 'failed'; reason: TerminationReason; error: HubFailedError };

/**
 * Inline, unbuffered observer attached with `BroadcastHub.tap`
 *
 * `next` runs synchronously on the producer's call to `push`.
 */
export interface HubSink<T> {
  next(value: T): void;
  complete?(): void;
  error?(error: LiveHubError): void;
}

export type TargetKind = 'subscription' | 'anchor' | 'sink';

export type OfferResult = 'accepted' | 'dropped' | 'overflow';

/**
 * Anything the broadcast core delivers to: buffered subscriptions, the
 * keep-alive anchor and inline sinks
 */
export interface DeliveryTarget<T> {
  readonly id: string;
  readonly kind: TargetKind;
  /** Elements the target buffers before its overflow policy applies */
  readonly capacity: number;
  offer(value: T): OfferResult;
  /** At or above its buffer capacity */
  isSaturated(): boolean;
  end(): void;
  fail(error: LiveHubError): void;
  /** Detach-side teardown; no further signals are delivered */
  release(): void;
}

/**
 * What a consumer reads from `Subscription.signals()`
 */
export type SubscriptionSignal<T> =
  | { type: 'element'; value: T }
  | { type: 'dropped'; count: number }
  | { type: 'end' }
  | { type: 'error'; error: LiveHubError };

export type SubscriptionState = 'active' | 'completed' | 'failed' | 'detached';

export interface SubscribeOptions {
  /** Overrides the hub's buffer size for this subscription */
  bufferSize?: number;
  /** Invoked synchronously whenever elements are discarded for this subscription */
  onDropped?: (count: number) => void;
  /** Aborting detaches the subscription */
  signal?: AbortSignal;
  /** Human-readable name used in logs */
  label?: string;
}

export interface HubOptions {
  /** @default 'live-hub' */
  name?: string;
  /** Per-subscription capacity. @default 256 */
  bufferSize?: number;
  /** @default 'drop-oldest' */
  overflow?: OverflowPolicy;
  /** Attach the keep-alive anchor at construction. @default true */
  keepAlive?: boolean;
}

export interface HubStats {
  name: string;
  state: HubState;
  overflow: OverflowPolicy;
  subscriberCount: number;
  pushedCount: number;
  droppedCount: number;
  anchored: boolean;
}

/**
 * Health check result from a hub registry
 */
export interface HealthCheckResult {
  healthy: boolean;
  error?: string;
}
