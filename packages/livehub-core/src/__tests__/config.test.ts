import { describe, it, expect } from 'vitest';
import { resolveHubOptions } from '../config.js';
import { LiveHubConfigError } from '../errors.js';

describe('resolveHubOptions', () => {
  it('falls back to defaults', () => {
    expect(resolveHubOptions({}, {})).toEqual({
      bufferSize: 256,
      overflow: 'drop-oldest',
      keepAlive: true,
    });
  });

  it('treats empty variables as unset', () => {
    expect(
      resolveHubOptions({}, { LIVEHUB_BUFFER_SIZE: '', LIVEHUB_OVERFLOW_POLICY: '', LIVEHUB_KEEP_ALIVE: '' }),
    ).toEqual({ bufferSize: 256, overflow: 'drop-oldest', keepAlive: true });
  });

  it('reads values from the environment', () => {
    expect(
      resolveHubOptions(
        {},
        { LIVEHUB_BUFFER_SIZE: '32', LIVEHUB_OVERFLOW_POLICY: 'block-producer', LIVEHUB_KEEP_ALIVE: '0' },
      ),
    ).toEqual({ bufferSize: 32, overflow: 'block-producer', keepAlive: false });
  });

  it('lets explicit options win', () => {
    expect(resolveHubOptions({ name: 'ticks', bufferSize: 8 }, { LIVEHUB_BUFFER_SIZE: '32' })).toEqual({
      name: 'ticks',
      bufferSize: 8,
      overflow: 'drop-oldest',
      keepAlive: true,
    });
  });

  it('names the invalid variable', () => {
    const invalid = [
      { LIVEHUB_BUFFER_SIZE: 'lots' },
      { LIVEHUB_BUFFER_SIZE: '-1' },
      { LIVEHUB_OVERFLOW_POLICY: 'drop-everything' },
      { LIVEHUB_KEEP_ALIVE: 'maybe' },
    ];

    for (const env of invalid) {
      const [variable] = Object.keys(env);
      try {
        resolveHubOptions({}, env);
        expect.unreachable(`${variable} should be rejected`);
      } catch (error) {
        expect(error).toBeInstanceOf(LiveHubConfigError);
        if (error instanceof LiveHubConfigError) {
          expect(error.variable).toBe(variable);
          expect(error.message.startsWith(`Invalid ${variable}: `)).toBe(true);
        }
      }
    }
  });
});
