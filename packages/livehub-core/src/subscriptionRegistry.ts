import type { DeliveryTarget } from './types.js';

/**
 * Tracks the targets currently attached to one hub
 *
 * Insertion order is delivery order. The registry itself has no lifetime policy;
 * `add` and `remove` report the empty/non-empty transitions so the hub can apply one.
 *
 * ## Usage
 *
 * ```typescript
 * const registry = new SubscriptionRegistry<Tick>();
 *
 * // Returns true if this was the first target
 * const isFirst = registry.add(subscription);
 *
 * // Deliver to a stable snapshot, so attach/detach during delivery is safe
 * for (const target of registry.snapshot()) {
 *   if (registry.has(target.id)) target.offer(tick);
 * }
 *
 * // Returns true if this was the last target
 * const wasLast = registry.remove(subscription.id);
 * ```
 */
export class SubscriptionRegistry<T> {
  private readonly targets = new Map<string, DeliveryTarget<T>>();

  /**
   * @returns `true` if the registry was empty before this target was added
   */
  add(target: DeliveryTarget<T>): boolean {
    this.targets.set(target.id, target);
    return this.targets.size === 1;
  }

  /**
   * Remove a target. Unknown ids are ignored.
   *
   * @returns `true` if this removal left the registry empty
   */
  remove(id: string): boolean {
    if (!this.targets.delete(id)) {
      return false;
    }
    return this.targets.size === 0;
  }

  get(id: string): DeliveryTarget<T> | undefined {
    return this.targets.get(id);
  }

  has(id: string): boolean {
    return this.targets.has(id);
  }

  snapshot(): DeliveryTarget<T>[] {
    return Array.from(this.targets.values());
  }

  some(predicate: (target: DeliveryTarget<T>) => boolean): boolean {
    for (const target of this.targets.values()) {
      if (predicate(target)) return true;
    }
    return false;
  }

  get size(): number {
    return this.targets.size;
  }

  clear(): void {
    this.targets.clear();
  }
}
