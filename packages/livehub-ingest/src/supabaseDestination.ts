/**
 * Supabase batch destination
 *
 * Inserts each batch into a PostgreSQL table through PostgREST in a single request.
 *
 * @example
 * ```typescript
 * import { createClient } from '@supabase/supabase-js';
 * import { BatchWriter, SupabaseBatchDestination } from '@livehub/ingest';
 *
 * const supabase = createClient(url, key);
 * const writer = new BatchWriter(new SupabaseBatchDestination<Tick>(supabase, {
 *   toRow: (tick) => ({ symbol: tick.symbol, price: tick.price, observed_at: tick.at.toISOString() }),
 * }));
 *
 * await writer.drainHub(ticks, 'price_ticks');
 * ```
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { BatchWriteError, BatchWriteRejectedError } from './errors.js';
import type { BatchDestination } from './types.js';

// Too many requests / service unavailable from the gateway
const REJECTION_STATUSES = new Set([429, 503]);

// too_many_connections, configuration_limit_exceeded, query_canceled (statement timeout)
const REJECTION_CODES = new Set(['53300', '53400', '57014']);

export interface SupabaseBatchDestinationOptions<R> {
  /** Maps a record to a table row. Records are inserted as-is by default */
  toRow?: (record: R) => Record<string, unknown>;
}

export class SupabaseBatchDestination<R extends object = Record<string, unknown>> implements BatchDestination<R> {
  private readonly client: SupabaseClient;
  private readonly toRow: (record: R) => Record<string, unknown>;

  constructor(client: SupabaseClient, options: SupabaseBatchDestinationOptions<R> = {}) {
    this.client = client;
    this.toRow = options.toRow ?? ((record) => Object.fromEntries(Object.entries(record)));
  }

  async writeBatch(table: string, records: readonly R[]): Promise<void> {
    const rows = records.map((record) => this.toRow(record));
    const { error, status } = await this.client.from(table).insert(rows);

    if (!error) {
      return;
    }

    if (REJECTION_STATUSES.has(status) || REJECTION_CODES.has(error.code)) {
      throw new BatchWriteRejectedError(table, `Batch rejected by ${table}: ${error.message}`, { cause: error });
    }

    throw new BatchWriteError(table, `Failed to insert batch into ${table}: ${error.message}`, { cause: error });
  }
}
