/**
 * Hub internals an inlet drives. Supplied by `BroadcastHub` when the inlet is
 * opened; not part of the public surface.
 */
export interface InletHost<T> {
  deliver(element: T): boolean;
  ready(): Promise<void>;
  complete(): void;
  fail(error: unknown): void;
  isClosed(): boolean;
}

/**
 * The single producer's handle on a hub
 *
 * Exactly one inlet exists per hub. Every call is synchronous and serialized on the
 * event loop, so callback-driven clients can call it straight from their callbacks.
 *
 * ## Usage
 *
 * ```typescript
 * const hub = new BroadcastHub<Tick>({ name: 'ticks' });
 * const inlet = hub.openInlet();
 *
 * feed.on('tick', (tick) => inlet.push(tick));
 * feed.on('close', () => inlet.complete());
 * feed.on('error', (error) => inlet.fail(error));
 * ```
 */
export class Inlet<T> {
  constructor(private readonly host: InletHost<T>) {}

  /**
   * Enqueue one element for fan-out.
   *
   * @returns `false` when the hub is saturated under `block-producer`; the element
   * is still delivered, and the producer should wait for `ready()` before pushing more
   * @throws ProducerContractViolationError once the hub has completed or failed
   */
  push(element: T): boolean {
    return this.host.deliver(element);
  }

  /**
   * Resolves when every subscription has room again. Immediate unless the hub uses
   * `block-producer` and is saturated.
   */
  ready(): Promise<void> {
    return this.host.ready();
  }

  /**
   * Wait for capacity, then push
   */
  async send(element: T): Promise<void> {
    await this.host.ready();
    this.host.deliver(element);
  }

  /**
   * No more elements: every subscription receives end-of-stream
   */
  complete(): void {
    this.host.complete();
  }

  /**
   * Abnormal termination: every subscription receives `HubFailedError`
   */
  fail(error: unknown): void {
    this.host.fail(error);
  }

  get closed(): boolean {
    return this.host.isClosed();
  }
}
