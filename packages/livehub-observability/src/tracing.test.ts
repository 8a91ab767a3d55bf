import { describe, expect, it } from 'vitest';
import { withSpan } from './tracing.js';

describe('withSpan', () => {
  it('returns the wrapped result', async () => {
    await expect(withSpan('livehub.test', { 'livehub.hub.name': 'ticks' }, () => 42)).resolves.toBe(42);
  });

  it('awaits async work inside the span', async () => {
    const result = await withSpan('livehub.test', {}, async () => {
      await Promise.resolve();
      return 'done';
    });

    expect(result).toBe('done');
  });

  it('rethrows errors from the wrapped function', async () => {
    await expect(
      withSpan('livehub.test', {}, () => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');
  });
});
