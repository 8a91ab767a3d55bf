import { describe, it, expect, vi } from 'vitest';
import type { SupabaseClient } from '@supabase/supabase-js';

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

import { BatchWriter } from '../batchWriter.js';
import { BatchWriteError, BatchWriteRejectedError } from '../errors.js';
import { SupabaseBatchDestination } from '../supabaseDestination.js';

interface InsertResponse {
  error: { message: string; code: string; details: string; hint: string } | null;
  status: number;
}

// Mock Supabase client
function createMockSupabaseClient(responses: InsertResponse[] = []) {
  const inserts: Array<{ table: string; rows: unknown[] }> = [];

  const client = {
    from: (table: string) => ({
      insert: async (rows: unknown[]) => {
        inserts.push({ table, rows });
        return responses.shift() ?? { error: null, status: 201 };
      },
    }),
  } as unknown as SupabaseClient;

  return { client, inserts };
}

const postgrestError = (message: string, code: string) => ({ message, code, details: '', hint: '' });

describe('SupabaseBatchDestination', () => {
  it('inserts a batch in a single request', async () => {
    const { client, inserts } = createMockSupabaseClient();
    const destination = new SupabaseBatchDestination(client);

    await destination.writeBatch('price_ticks', [
      { symbol: 'ABC', price: 1 },
      { symbol: 'DEF', price: 2 },
    ]);

    expect(inserts).toEqual([
      {
        table: 'price_ticks',
        rows: [
          { symbol: 'ABC', price: 1 },
          { symbol: 'DEF', price: 2 },
        ],
      },
    ]);
  });

  it('maps records to rows', async () => {
    const { client, inserts } = createMockSupabaseClient();
    const destination = new SupabaseBatchDestination<{ symbol: string; at: Date }>(client, {
      toRow: (record) => ({ symbol: record.symbol, observed_at: record.at.toISOString() }),
    });

    await destination.writeBatch('price_ticks', [{ symbol: 'ABC', at: new Date('2024-01-01T00:00:00.000Z') }]);

    expect(inserts[0].rows).toEqual([{ symbol: 'ABC', observed_at: '2024-01-01T00:00:00.000Z' }]);
  });

  it('treats throttling statuses as rejections', async () => {
    const { client } = createMockSupabaseClient([{ error: postgrestError('Too many requests', ''), status: 429 }]);
    const destination = new SupabaseBatchDestination(client);

    await expect(destination.writeBatch('price_ticks', [{ price: 1 }])).rejects.toBeInstanceOf(
      BatchWriteRejectedError,
    );
  });

  it('treats connection exhaustion as a rejection', async () => {
    const { client } = createMockSupabaseClient([
      { error: postgrestError('sorry, too many clients already', '53300'), status: 500 },
    ]);
    const destination = new SupabaseBatchDestination(client);

    await expect(destination.writeBatch('price_ticks', [{ price: 1 }])).rejects.toThrow(
      'Batch rejected by price_ticks: sorry, too many clients already',
    );
  });

  it('fails other errors without marking them retryable', async () => {
    const { client } = createMockSupabaseClient([
      { error: postgrestError('duplicate key value violates unique constraint', '23505'), status: 409 },
    ]);
    const destination = new SupabaseBatchDestination(client);

    const error = await destination.writeBatch('price_ticks', [{ price: 1 }]).then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(BatchWriteError);
    expect(error).not.toBeInstanceOf(BatchWriteRejectedError);
    expect(error).toHaveProperty(
      'message',
      'Failed to insert batch into price_ticks: duplicate key value violates unique constraint',
    );
  });

  it('lets the writer retry a throttled batch', async () => {
    const { client, inserts } = createMockSupabaseClient([
      { error: null, status: 201 },
      { error: postgrestError('Service unavailable', ''), status: 503 },
    ]);
    const writer = new BatchWriter(new SupabaseBatchDestination(client), {
      batchSize: 2,
      sleep: () => Promise.resolve(),
    });

    const result = await writer.write([{ price: 1 }, { price: 2 }, { price: 3 }], 'price_ticks');

    expect(inserts.map((insert) => insert.rows.length)).toEqual([2, 1, 1]);
    expect(result.writtenRecords).toBe(3);
    expect(result.batches.map((batch) => batch.attempts)).toEqual([1, 2]);
  });
});
