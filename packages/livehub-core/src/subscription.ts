import type { LiveHubError } from './errors.js';
import type {
  DeliveryTarget,
  OfferResult,
  OverflowPolicy,
  SubscribeOptions,
  SubscriptionSignal,
  SubscriptionState,
} from './types.js';

/**
 * Callbacks a subscription uses to reach the hub that owns it
 */
export interface SubscriptionHost {
  detach(id: string): void;
  /** `gapStarted` is false while the drop extends a gap that is still unread */
  onDropped(id: string, count: number, gapStarted: boolean): void;
  onDrained(): void;
}

export interface SubscriptionInit {
  id: string;
  capacity: number;
  policy: OverflowPolicy;
  host: SubscriptionHost;
  options?: SubscribeOptions;
}

type BufferEntry<T> = { kind: 'element'; value: T } | { kind: 'gap'; count: number };

type TerminalSignal = { type: 'end' } | { type: 'error'; error: LiveHubError };

/**
 * A buffered delivery channel from a hub to one consumer
 *
 * Read it with `for await` (elements only; the loop ends at end-of-stream and throws
 * on hub failure) or with `signals()`, which also reports where elements were dropped.
 * Leaving a `for await` loop early, calling `unsubscribe()` or aborting the signal
 * given at attach time all detach the subscription the same way.
 *
 * ## Usage
 *
 * ```typescript
 * const subscription = hub.subscribe({ bufferSize: 32 });
 *
 * for await (const tick of subscription) {
 *   render(tick);
 * }
 * ```
 */
export class Subscription<T> implements AsyncIterableIterator<T>, DeliveryTarget<T> {
  readonly id: string;
  readonly kind = 'subscription' as const;
  readonly capacity: number;
  readonly label?: string;

  private readonly policy: OverflowPolicy;
  private readonly host: SubscriptionHost;
  private readonly onDroppedCallback?: (count: number) => void;
  private readonly signal?: AbortSignal;
  private readonly queue: BufferEntry<T>[] = [];
  private readonly waiters: Array<(signal: SubscriptionSignal<T>) => void> = [];
  private elementCount = 0;
  private dropped = 0;
  private terminal: TerminalSignal | null = null;
  private status: SubscriptionState = 'active';

  constructor(init: SubscriptionInit) {
    this.id = init.id;
    this.capacity = init.capacity;
    this.policy = init.policy;
    this.host = init.host;
    this.label = init.options?.label;
    this.onDroppedCallback = init.options?.onDropped;
    this.signal = init.options?.signal;

    if (this.signal && !this.signal.aborted) {
      this.signal.addEventListener('abort', this.handleAbort, { once: true });
    }
  }

  get state(): SubscriptionState {
    return this.status;
  }

  /** Elements currently buffered and not yet read */
  get buffered(): number {
    return this.elementCount;
  }

  /** Elements discarded for this subscription by a drop policy */
  get droppedCount(): number {
    return this.dropped;
  }

  offer(value: T): OfferResult {
    if (this.status !== 'active') {
      return 'accepted';
    }

    if (this.elementCount >= this.capacity) {
      switch (this.policy) {
        case 'fail-fast':
          return 'overflow';
        case 'drop-newest':
          this.noteDropped(this.insertGap(this.queue.length));
          return 'dropped';
        case 'drop-oldest': {
          const gapStarted = this.evictOldest();
          this.enqueue(value);
          this.noteDropped(gapStarted);
          return 'dropped';
        }
        case 'block-producer':
          // capacity is a high-water mark; the inlet reports saturation instead
          break;
      }
    }

    this.enqueue(value);
    return 'accepted';
  }

  isSaturated(): boolean {
    return this.status === 'active' && this.elementCount >= this.capacity;
  }

  end(): void {
    this.terminate({ type: 'end' }, 'completed');
  }

  fail(error: LiveHubError): void {
    this.terminate({ type: 'error', error }, 'failed');
  }

  release(): void {
    if (this.status === 'detached') return;

    this.status = 'detached';
    this.queue.length = 0;
    this.elementCount = 0;
    this.stopWatchingSignal();
    this.flushWaiters();
  }

  /**
   * Detach from the hub. Idempotent; a no-op on an already terminated subscription
   * apart from discarding whatever it still buffers.
   */
  unsubscribe(): void {
    if (this.status === 'detached') return;

    if (this.status === 'active') {
      this.host.detach(this.id);
    }
    this.release();
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    for (;;) {
      const signal = await this.nextSignal();
      switch (signal.type) {
        case 'element':
          return { done: false, value: signal.value };
        case 'dropped':
          continue;
        case 'end':
          return { done: true, value: undefined };
        case 'error':
          throw signal.error;
      }
    }
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.unsubscribe();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /**
   * Every signal in delivery order: elements, drop markers at the position where
   * elements were lost, then exactly one `end` or `error`
   */
  async *signals(): AsyncGenerator<SubscriptionSignal<T>, void, undefined> {
    try {
      for (;;) {
        const signal = await this.nextSignal();
        if (signal.type === 'end' && this.status === 'detached') return;
        yield signal;
        if (signal.type === 'end' || signal.type === 'error') return;
      }
    } finally {
      this.unsubscribe();
    }
  }

  private nextSignal(): Promise<SubscriptionSignal<T>> {
    const available = this.takeSignal();
    if (available) {
      return Promise.resolve(available);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private takeSignal(): SubscriptionSignal<T> | undefined {
    if (this.status === 'detached') {
      return { type: 'end' };
    }

    const head = this.queue.shift();
    if (head?.kind === 'element') {
      this.elementCount -= 1;
      if (this.policy === 'block-producer' && this.elementCount < this.capacity) {
        this.host.onDrained();
      }
      return { type: 'element', value: head.value };
    }
    if (head?.kind === 'gap') {
      return { type: 'dropped', count: head.count };
    }

    return this.terminal ?? undefined;
  }

  private flushWaiters(): void {
    while (this.waiters.length > 0) {
      const signal = this.takeSignal();
      if (!signal) return;
      this.waiters.shift()?.(signal);
    }
  }

  private enqueue(value: T): void {
    this.queue.push({ kind: 'element', value });
    this.elementCount += 1;
    this.flushWaiters();
  }

  private evictOldest(): boolean {
    const index = this.queue.findIndex((entry) => entry.kind === 'element');
    if (index === -1) return false;

    this.queue.splice(index, 1);
    this.elementCount -= 1;
    return this.insertGap(index);
  }

  /**
   * @returns `true` if a new gap marker was inserted, `false` if an adjacent one grew
   */
  private insertGap(index: number): boolean {
    const previous = this.queue[index - 1];
    if (previous?.kind === 'gap') {
      previous.count += 1;
      return false;
    }
    this.queue.splice(index, 0, { kind: 'gap', count: 1 });
    return true;
  }

  private noteDropped(gapStarted: boolean): void {
    this.dropped += 1;
    this.host.onDropped(this.id, 1, gapStarted);
    this.onDroppedCallback?.(1);
  }

  private terminate(signal: TerminalSignal, status: SubscriptionState): void {
    if (this.status !== 'active') return;

    this.terminal = signal;
    this.status = status;
    this.stopWatchingSignal();
    this.flushWaiters();
  }

  private stopWatchingSignal(): void {
    this.signal?.removeEventListener('abort', this.handleAbort);
  }

  private readonly handleAbort = (): void => {
    this.unsubscribe();
  };
}
