import {
  createLogger,
  recordElementPushed,
  recordElementsDropped,
  recordHubTerminated,
  recordSubscriptionChange,
  type Logger,
} from '@livehub/observability';
import {
  DeliveryFailedError,
  HubFailedError,
  ProducerContractViolationError,
  SubscriberOverflowError,
  toError,
} from './errors.js';
import { Inlet } from './inlet.js';
import { KeepAliveAnchor } from './keepAliveAnchor.js';
import { SinkTarget } from './sinkTarget.js';
import { Subscription, type SubscriptionHost } from './subscription.js';
import { SubscriptionRegistry } from './subscriptionRegistry.js';
import type {
  DeliveryTarget,
  HubOptions,
  HubOutcome,
  HubSink,
  HubState,
  HubStats,
  OfferResult,
  OverflowPolicy,
  SubscribeOptions,
} from './types.js';

const logger = createLogger('BroadcastHub');

const DEFAULT_HUB_NAME = 'live-hub';
const DEFAULT_BUFFER_SIZE = 256;
const DEFAULT_OVERFLOW: OverflowPolicy = 'drop-oldest';

/**
 * Cleanup returned by a source's `start`; runs once when the hub terminates
 */
export type SourceTeardown = () => void;

export type SourceStart<T> = (inlet: Inlet<T>) => SourceTeardown | void;

function assertCapacity(value: number, what: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${what} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Single-producer, many-consumer live broadcast
 *
 * One producer pushes elements through the hub's inlet; every subscription attached
 * at that moment receives them in push order. A subscription sees only elements
 * pushed after it attached: there is no replay. Each subscription buffers up to
 * `bufferSize` elements, and the hub's overflow policy decides what happens to a
 * subscriber that falls behind.
 *
 * A keep-alive anchor is attached at construction (unless `keepAlive: false`), so
 * the hub outlives periods with no subscribers and runs until the producer finishes
 * or the owner calls `shutdown()`.
 *
 * ## Architecture
 *
 * ```
 * Producer ──push──▶ Inlet ──▶ BroadcastHub ──snapshot of registry──┬─▶ Subscription A (buffer)
 *                                                                    ├─▶ Subscription B (buffer)
 *                                                                    ├─▶ Sink (inline, e.g. derived hub)
 *                                                                    └─▶ Keep-alive anchor (discards)
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * const hub = new BroadcastHub<Tick>({ name: 'ticks', bufferSize: 64 });
 * const inlet = hub.openInlet();
 *
 * const subscription = hub.subscribe();
 * inlet.push({ symbol: 'ABC', price: 10 });
 *
 * for await (const tick of subscription) {
 *   console.log(tick.price);
 * }
 * ```
 */
export class BroadcastHub<T> {
  readonly name: string;
  readonly bufferSize: number;
  readonly overflow: OverflowPolicy;

  private readonly registry = new SubscriptionRegistry<T>();
  private readonly log: Logger;
  private readonly anchorId: string;
  private readonly terminated: Promise<HubOutcome>;
  private resolveTerminated: (outcome: HubOutcome) => void = () => {};
  private hubState: HubState = 'created';
  private outcome: HubOutcome | null = null;
  private inlet: Inlet<T> | null = null;
  private producerFinished = false;
  private teardown: SourceTeardown | null = null;
  private readyWaiters: Array<() => void> = [];
  private nextTargetId = 0;
  private pushed = 0;
  private dropped = 0;

  private readonly subscriptionHost: SubscriptionHost = {
    detach: (id) => this.detach(id),
    onDropped: (id, count, gapStarted) => this.noteDropped(id, count, gapStarted),
    onDrained: () => this.releaseReadyWaiters(),
  };

  constructor(options: HubOptions = {}) {
    this.name = options.name ?? DEFAULT_HUB_NAME;
    this.bufferSize = assertCapacity(options.bufferSize ?? DEFAULT_BUFFER_SIZE, 'bufferSize');
    this.overflow = options.overflow ?? DEFAULT_OVERFLOW;
    this.anchorId = `${this.name}:anchor`;
    this.log = logger.child({ hubName: this.name });
    this.terminated = new Promise<HubOutcome>((resolve) => {
      this.resolveTerminated = resolve;
    });

    const keepAlive = options.keepAlive ?? true;
    if (keepAlive) {
      this.registry.add(new KeepAliveAnchor<T>(this.anchorId));
    }

    this.log.info(
      { bufferSize: this.bufferSize, overflow: this.overflow, anchored: keepAlive },
      'Hub created',
    );
  }

  /**
   * Wrap a callback-driven producer. `start` runs once, synchronously, with the
   * hub's inlet; the teardown it returns runs when the hub terminates for any
   * reason. A synchronous throw from `start` fails the hub.
   */
  static fromSource<T>(start: SourceStart<T>, options: HubOptions = {}): BroadcastHub<T> {
    const hub = new BroadcastHub<T>(options);
    const inlet = hub.openInlet();

    try {
      const teardown = start(inlet);
      if (teardown) {
        hub.attachTeardown(teardown);
      }
    } catch (error) {
      hub.log.error({ err: toError(error) }, 'Source failed to start');
      if (!inlet.closed) {
        inlet.fail(error);
      }
    }

    return hub;
  }

  get state(): HubState {
    return this.hubState;
  }

  get anchored(): boolean {
    return this.registry.has(this.anchorId);
  }

  /**
   * Claim the producer side of the hub. There is exactly one inlet per hub.
   *
   * @throws ProducerContractViolationError if the inlet was already claimed
   */
  openInlet(): Inlet<T> {
    if (this.inlet) {
      throw new ProducerContractViolationError(this.name, 'inlet already claimed');
    }

    this.inlet = new Inlet<T>({
      deliver: (element) => this.deliver(element),
      ready: () => this.ready(),
      complete: () => this.completeFromProducer(),
      fail: (error) => this.failFromProducer(error),
      isClosed: () => this.isTerminal(),
    });

    if (this.hubState === 'created') {
      this.hubState = 'running';
    }
    this.log.debug('Inlet opened');

    return this.inlet;
  }

  /**
   * Attach a buffered subscription. It receives only elements pushed from now on.
   * Attaching after the hub terminated returns a subscription that is already
   * ended, or already failed with the hub's error.
   */
  subscribe(options: SubscribeOptions = {}): Subscription<T> {
    const capacity = assertCapacity(options.bufferSize ?? this.bufferSize, 'bufferSize');
    const subscription = new Subscription<T>({
      id: this.allocateId('sub'),
      capacity,
      policy: this.overflow,
      host: this.subscriptionHost,
      options,
    });

    if (this.outcome) {
      if (this.outcome.state === 'failed') {
        subscription.fail(this.outcome.error);
      } else {
        subscription.end();
      }
      return subscription;
    }

    if (options.signal?.aborted) {
      subscription.release();
      return subscription;
    }

    this.registry.add(subscription);
    recordSubscriptionChange(1, { hub: this.name });
    this.log.debug(
      { subscriptionId: subscription.id, label: options.label, capacity },
      'Subscription attached',
    );

    return subscription;
  }

  /**
   * Attach an inline, unbuffered sink. `next` runs synchronously on every push;
   * if it throws, the sink is detached and receives the error.
   *
   * @returns A function that detaches the sink
   */
  tap(sink: HubSink<T>): () => void {
    const target = new SinkTarget<T>(this.allocateId('sink'), sink);

    if (this.outcome) {
      if (this.outcome.state === 'failed') {
        target.fail(this.outcome.error);
      } else {
        target.end();
      }
      return () => {};
    }

    this.registry.add(target);
    this.log.debug({ subscriptionId: target.id }, 'Sink attached');

    return () => {
      this.detach(target.id);
      target.release();
    };
  }

  /**
   * Detach the keep-alive anchor. From then on the hub completes with reason
   * `idle` as soon as its last target detaches.
   */
  releaseAnchor(): void {
    if (!this.registry.has(this.anchorId)) return;

    this.log.info('Keep-alive anchor released');
    this.detach(this.anchorId);
  }

  /**
   * Owner teardown. Every attached target receives end-of-stream, or the failure
   * when `cause` is given, and the producer's teardown runs. Idempotent.
   */
  shutdown(cause?: unknown): void {
    if (this.isTerminal()) return;

    if (cause === undefined) {
      this.terminate({ state: 'completed', reason: 'shutdown' });
    } else {
      this.terminate({
        state: 'failed',
        reason: 'shutdown',
        error: new HubFailedError(this.name, cause),
      });
    }
  }

  whenTerminated(): Promise<HubOutcome> {
    return this.terminated;
  }

  getStats(): HubStats {
    const anchored = this.anchored;
    return {
      name: this.name,
      state: this.hubState,
      overflow: this.overflow,
      subscriberCount: this.registry.size - (anchored ? 1 : 0),
      pushedCount: this.pushed,
      droppedCount: this.dropped,
      anchored,
    };
  }

  private deliver(element: T): boolean {
    if (this.isTerminal()) {
      throw new ProducerContractViolationError(
        this.name,
        `push after the hub ${this.hubState === 'failed' ? 'failed' : 'completed'}`,
      );
    }

    this.pushed += 1;
    recordElementPushed({ hub: this.name });

    for (const target of this.registry.snapshot()) {
      // Detached by an earlier target during this delivery
      if (!this.registry.has(target.id)) continue;

      let result: OfferResult;
      try {
        result = target.offer(element);
      } catch (error) {
        this.isolate(target, error);
        continue;
      }

      if (result === 'overflow') {
        this.log.warn(
          { subscriptionId: target.id, capacity: target.capacity },
          'Subscription overflowed under fail-fast',
        );
        this.terminate({
          state: 'failed',
          reason: 'overflow',
          error: new HubFailedError(this.name, new SubscriberOverflowError(target.id, target.capacity)),
        });
        break;
      }
    }

    return !this.isSaturated();
  }

  private ready(): Promise<void> {
    if (this.isTerminal() || !this.isSaturated()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.readyWaiters.push(resolve);
    });
  }

  private completeFromProducer(): void {
    if (this.producerFinished) {
      throw new ProducerContractViolationError(this.name, 'complete() after the producer already finished');
    }
    this.producerFinished = true;
    if (this.isTerminal()) return;

    this.terminate({ state: 'completed', reason: 'producer' });
  }

  private failFromProducer(error: unknown): void {
    if (this.producerFinished) {
      throw new ProducerContractViolationError(this.name, 'fail() after the producer already finished', {
        cause: error,
      });
    }
    this.producerFinished = true;
    if (this.isTerminal()) return;

    this.terminate({ state: 'failed', reason: 'producer', error: new HubFailedError(this.name, error) });
  }

  private isTerminal(): boolean {
    return this.outcome !== null;
  }

  private isSaturated(): boolean {
    return this.overflow === 'block-producer' && this.registry.some((target) => target.isSaturated());
  }

  private allocateId(kind: 'sub' | 'sink'): string {
    this.nextTargetId += 1;
    return `${this.name}:${kind}-${this.nextTargetId}`;
  }

  /**
   * @returns `true` if removing the target left the registry empty
   */
  private removeTarget(id: string): boolean {
    const target = this.registry.get(id);
    if (!target) return false;

    const becameEmpty = this.registry.remove(id);
    if (target.kind === 'subscription') {
      recordSubscriptionChange(-1, { hub: this.name });
    }
    this.log.debug({ subscriptionId: id, kind: target.kind }, 'Target detached');

    return becameEmpty;
  }

  private detach(id: string): void {
    const becameEmpty = this.removeTarget(id);
    this.releaseReadyWaiters();
    if (becameEmpty) {
      this.completeIdle();
    }
  }

  private isolate(target: DeliveryTarget<T>, error: unknown): void {
    this.log.warn({ err: toError(error), subscriptionId: target.id }, 'Delivery failed; detaching target');

    const becameEmpty = this.removeTarget(target.id);
    try {
      target.fail(new DeliveryFailedError(target.id, error));
    } catch (failError) {
      this.log.warn({ err: toError(failError), subscriptionId: target.id }, 'Target threw while receiving its failure');
    }

    this.releaseReadyWaiters();
    if (becameEmpty) {
      this.completeIdle();
    }
  }

  private completeIdle(): void {
    if (this.isTerminal()) return;
    this.terminate({ state: 'completed', reason: 'idle' });
  }

  private noteDropped(id: string, count: number, gapStarted: boolean): void {
    this.dropped += count;
    recordElementsDropped(count, { hub: this.name, policy: this.overflow });
    // One line per gap; the metric carries the per-element count
    if (gapStarted) {
      this.log.warn({ subscriptionId: id, policy: this.overflow }, 'Subscription fell behind; dropping elements');
    }
  }

  private releaseReadyWaiters(): void {
    if (this.readyWaiters.length === 0) return;
    if (!this.isTerminal() && this.isSaturated()) return;

    const waiters = this.readyWaiters;
    this.readyWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private attachTeardown(teardown: SourceTeardown): void {
    if (this.isTerminal()) {
      this.runTeardown(teardown);
      return;
    }
    this.teardown = teardown;
  }

  private runTeardown(teardown: SourceTeardown): void {
    try {
      teardown();
    } catch (error) {
      this.log.error({ err: toError(error) }, 'Source teardown failed');
    }
  }

  private terminate(outcome: HubOutcome): void {
    if (this.outcome) return;

    this.outcome = outcome;
    this.hubState = outcome.state;

    const targets = this.registry.snapshot();
    this.registry.clear();

    for (const target of targets) {
      if (target.kind === 'subscription') {
        recordSubscriptionChange(-1, { hub: this.name });
      }
      try {
        if (outcome.state === 'failed') {
          target.fail(outcome.error);
        } else {
          target.end();
        }
      } catch (error) {
        this.log.warn({ err: toError(error), subscriptionId: target.id }, 'Target threw while receiving end of stream');
      }
    }

    this.releaseReadyWaiters();

    const teardown = this.teardown;
    this.teardown = null;
    if (teardown) {
      this.runTeardown(teardown);
    }

    recordHubTerminated({ hub: this.name, outcome: outcome.state, reason: outcome.reason });

    if (outcome.state === 'failed') {
      this.log.error({ err: outcome.error, reason: outcome.reason, pushed: this.pushed }, 'Hub failed');
    } else {
      this.log.info({ reason: outcome.reason, pushed: this.pushed }, 'Hub completed');
    }

    this.resolveTerminated(outcome);
  }
}
