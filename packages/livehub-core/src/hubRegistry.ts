import { createLogger } from '@livehub/observability';
import type { BroadcastHub } from './broadcastHub.js';
import { getErrorMessage, toError } from './errors.js';
import type { HealthCheckResult } from './types.js';

const logger = createLogger('HubRegistry');

/**
 * Owns a set of named hubs
 *
 * Handles:
 * - Lazy creation: a hub is only built when first requested
 * - Promise de-duplication: concurrent requests for one name share a single factory call
 * - Cleanup: hubs are forgotten once they terminate, so the next request builds a fresh one
 *
 * ## Usage
 *
 * ```typescript
 * const hubs = new HubRegistry<Tick>();
 *
 * const hub = await hubs.getOrCreate('ticks:ABC', async () => {
 *   return createRedisChannelHub({ client, channel: 'ticks:ABC', parse: parseTick }, { name: 'ticks:ABC' });
 * });
 *
 * // Shutdown every hub
 * await hubs.shutdown();
 * ```
 */
export class HubRegistry<T> {
  private readonly hubs = new Map<string, Promise<BroadcastHub<T>>>();
  private readonly failures = new Map<string, string>();

  /**
   * Get an existing hub or create a new one
   *
   * A factory that rejects is removed from the registry so a later call retries.
   */
  getOrCreate(name: string, factory: () => Promise<BroadcastHub<T>> | BroadcastHub<T>): Promise<BroadcastHub<T>> {
    const existing = this.hubs.get(name);
    if (existing) {
      return existing;
    }

    const promise: Promise<BroadcastHub<T>> = Promise.resolve()
      .then(factory)
      .then(
        (hub) => {
          this.watch(name, hub, promise);
          return hub;
        },
        (error: unknown) => {
          if (this.hubs.get(name) === promise) {
            this.hubs.delete(name);
          }
          logger.error({ err: toError(error), hubName: name }, 'Hub factory failed');
          throw error;
        },
      );

    this.hubs.set(name, promise);
    return promise;
  }

  has(name: string): boolean {
    return this.hubs.has(name);
  }

  get(name: string): Promise<BroadcastHub<T>> | undefined {
    return this.hubs.get(name);
  }

  /**
   * Take (remove and return) a hub without shutting it down
   */
  take(name: string): Promise<BroadcastHub<T>> | undefined {
    const hub = this.hubs.get(name);
    this.hubs.delete(name);
    return hub;
  }

  get size(): number {
    return this.hubs.size;
  }

  /**
   * Shut every registered hub down and clear the registry
   */
  async shutdown(): Promise<void> {
    const entries = Array.from(this.hubs.entries());
    this.hubs.clear();

    await Promise.all(
      entries.map(async ([name, pending]) => {
        try {
          const hub = await pending;
          hub.shutdown();
        } catch (error) {
          logger.warn({ err: toError(error), hubName: name }, 'Error shutting down hub');
        }
      }),
    );

    logger.info({ hubCount: entries.length }, 'Hub registry shut down');
  }

  /**
   * Unhealthy when any hub created by this registry failed since the last check
   */
  async healthCheck(): Promise<HealthCheckResult> {
    if (this.failures.size === 0) {
      return { healthy: true };
    }

    const error = Array.from(this.failures.entries())
      .map(([name, message]) => `${name}: ${message}`)
      .join('; ');
    this.failures.clear();

    return { healthy: false, error };
  }

  private watch(name: string, hub: BroadcastHub<T>, promise: Promise<BroadcastHub<T>>): void {
    void hub.whenTerminated().then((outcome) => {
      if (this.hubs.get(name) === promise) {
        this.hubs.delete(name);
      }
      if (outcome.state === 'failed' && outcome.reason !== 'shutdown') {
        this.failures.set(name, getErrorMessage(outcome.error));
      }
      logger.debug({ hubName: name, state: outcome.state, reason: outcome.reason }, 'Hub removed from registry');
    });
  }
}
