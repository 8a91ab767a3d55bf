import { describe, it, expect } from 'vitest';
import { KeepAliveAnchor } from '../keepAliveAnchor.js';
import { SinkTarget } from '../sinkTarget.js';
import { SubscriptionRegistry } from '../subscriptionRegistry.js';

describe('SubscriptionRegistry', () => {
  it('reports the first add and the last remove', () => {
    const registry = new SubscriptionRegistry<number>();
    const anchor = new KeepAliveAnchor<number>('hub:anchor');
    const sink = new SinkTarget<number>('hub:sink-1', { next: () => {} });

    expect(registry.add(anchor)).toBe(true);
    expect(registry.add(sink)).toBe(false);
    expect(registry.remove('hub:anchor')).toBe(false);
    expect(registry.remove('hub:sink-1')).toBe(true);
  });

  it('ignores unknown ids', () => {
    const registry = new SubscriptionRegistry<number>();
    registry.add(new KeepAliveAnchor<number>('hub:anchor'));

    expect(registry.remove('hub:sub-9')).toBe(false);
    expect(registry.size).toBe(1);
  });

  it('snapshots targets in insertion order and clears them', () => {
    const registry = new SubscriptionRegistry<number>();
    registry.add(new KeepAliveAnchor<number>('hub:anchor'));
    registry.add(new SinkTarget<number>('hub:sink-1', { next: () => {} }));
    registry.add(new SinkTarget<number>('hub:sink-2', { next: () => {} }));

    expect(registry.snapshot().map((target) => target.id)).toEqual(['hub:anchor', 'hub:sink-1', 'hub:sink-2']);
    expect(registry.some((target) => target.kind === 'anchor')).toBe(true);
    expect(registry.some((target) => target.kind === 'subscription')).toBe(false);

    registry.clear();
    expect(registry.size).toBe(0);
    expect(registry.has('hub:anchor')).toBe(false);
  });
});
