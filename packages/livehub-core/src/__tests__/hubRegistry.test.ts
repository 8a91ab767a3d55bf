import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@livehub/observability', async () => {
  const actual = await vi.importActual<typeof import('@livehub/observability')>('@livehub/observability');
  const createMockLogger = (): Record<string, unknown> => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: () => createMockLogger(),
  });
  return { ...actual, createLogger: () => createMockLogger() };
});

import { BroadcastHub } from '../broadcastHub.js';
import { HubRegistry } from '../hubRegistry.js';

describe('HubRegistry', () => {
  let registry: HubRegistry<number>;

  beforeEach(() => {
    registry = new HubRegistry<number>();
  });

  it('shares one factory call between concurrent requests', async () => {
    const factory = vi.fn(() => new BroadcastHub<number>({ name: 'shared' }));

    const [first, second] = await Promise.all([
      registry.getOrCreate('shared', factory),
      registry.getOrCreate('shared', factory),
    ]);

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(1);
  });

  it('forgets a failed factory so a later call retries', async () => {
    await expect(
      registry.getOrCreate('flaky', () => Promise.reject(new Error('not ready'))),
    ).rejects.toThrow('not ready');
    expect(registry.has('flaky')).toBe(false);

    const hub = await registry.getOrCreate('flaky', () => new BroadcastHub<number>({ name: 'flaky' }));
    expect(hub.name).toBe('flaky');
    expect(registry.has('flaky')).toBe(true);
  });

  it('removes a hub once it terminates', async () => {
    const hub = await registry.getOrCreate('short-lived', () => new BroadcastHub<number>({ name: 'short-lived' }));

    hub.shutdown();
    await hub.whenTerminated();

    expect(registry.has('short-lived')).toBe(false);
  });

  it('takes a hub out without shutting it down', async () => {
    await registry.getOrCreate('kept', () => new BroadcastHub<number>({ name: 'kept' }));

    const taken = registry.take('kept');

    expect(registry.has('kept')).toBe(false);
    const hub = await taken;
    expect(hub?.state).toBe('created');
  });

  it('shuts every hub down', async () => {
    const a = await registry.getOrCreate('a', () => new BroadcastHub<number>({ name: 'a' }));
    const b = await registry.getOrCreate('b', () => new BroadcastHub<number>({ name: 'b' }));

    await registry.shutdown();

    expect(a.state).toBe('completed');
    expect(b.state).toBe('completed');
    expect(registry.size).toBe(0);
  });

  it('reports failed hubs in the health check', async () => {
    const hub = await registry.getOrCreate('feed', () => new BroadcastHub<number>({ name: 'feed' }));
    expect(await registry.healthCheck()).toEqual({ healthy: true });

    hub.openInlet().fail(new Error('down'));
    await hub.whenTerminated();

    expect(await registry.healthCheck()).toEqual({ healthy: false, error: 'feed: Hub "feed" failed: down' });
    expect(await registry.healthCheck()).toEqual({ healthy: true });
  });
});
