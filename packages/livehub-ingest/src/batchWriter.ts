import type { BroadcastHub, SubscribeOptions } from '@livehub/core';
import { Subscription, toError } from '@livehub/core';
import { createLogger, recordBatchWrite, requestContext, withSpan } from '@livehub/observability';
import { resolveIngestSettings } from './config.js';
import { BatchWriteError, BatchWriteRejectedError } from './errors.js';
import type {
  BatchDestination,
  BatchIngestResult,
  BatchOutcome,
  BatchWriterOptions,
  RecordResult,
} from './types.js';

const logger = createLogger('BatchWriter');

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function assertPositiveInteger(value: number, what: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${what} must be a positive integer, got ${value}`);
  }
  return value;
}

function toBatchWriteError(error: unknown, destination: string): BatchWriteError {
  if (error instanceof BatchWriteError) {
    return error;
  }
  const cause = toError(error);
  return new BatchWriteError(destination, `Batch write to ${destination} failed: ${cause.message}`, { cause });
}

interface RunState {
  writeCalls: number;
}

/**
 * Writes many records to a destination in size-bounded batches
 *
 * Records are never written one call per record and never all in one call. Batches
 * go out sequentially unless `maxConcurrency` allows more in flight. A batch the
 * destination rejects (`BatchWriteRejectedError`) is re-sent alone with exponential
 * backoff; batches already acknowledged are never re-sent. A batch that exhausts its
 * retries or fails outright is reported and the writer moves on, unless
 * `stopOnFailure` is set.
 *
 * @example
 * ```typescript
 * const writer = new BatchWriter(new SupabaseBatchDestination(supabase), { batchSize: 500 });
 * const result = await writer.write(rows, 'price_ticks');
 *
 * if (result.failedRecords > 0) {
 *   const failed = toRecordResults(result).filter((record) => record.status === 'failed');
 * }
 * ```
 */
export class BatchWriter<R> {
  readonly batchSize: number;
  readonly maxRetries: number;
  readonly retryBaseMs: number;
  readonly retryMaxMs: number;
  readonly maxConcurrency: number;
  readonly stopOnFailure: boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly target: BatchDestination<R>,
    options: BatchWriterOptions = {},
  ) {
    const settings = resolveIngestSettings();
    this.batchSize = assertPositiveInteger(options.batchSize ?? settings.batchSize, 'batchSize');
    this.maxRetries = options.maxRetries ?? settings.maxRetries;
    this.retryBaseMs = options.retryBaseMs ?? settings.retryBaseMs;
    this.retryMaxMs = options.retryMaxMs ?? settings.retryMaxMs;
    this.maxConcurrency = assertPositiveInteger(options.maxConcurrency ?? 1, 'maxConcurrency');
    this.stopOnFailure = options.stopOnFailure ?? false;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Write a finite, known-size sequence of records
   */
  async write(records: readonly R[], destination: string): Promise<BatchIngestResult> {
    return requestContext.run({ destination }, async () => {
      const batches: R[][] = [];
      for (let offset = 0; offset < records.length; offset += this.batchSize) {
        batches.push(records.slice(offset, offset + this.batchSize));
      }

      const state: RunState = { writeCalls: 0 };
      const outcomes: Array<BatchOutcome | undefined> = batches.map(() => undefined);
      let nextIndex = 0;
      let stopped = false;

      const worker = async (): Promise<void> => {
        while (!stopped && nextIndex < batches.length) {
          const index = nextIndex;
          nextIndex += 1;
          const outcome = await this.writeBatch(batches[index], index, index * this.batchSize, destination, state);
          outcomes[index] = outcome;
          if (outcome.status !== 'written' && this.stopOnFailure) {
            stopped = true;
          }
        }
      };

      const workerCount = Math.min(this.maxConcurrency, batches.length);
      await Promise.all(Array.from({ length: workerCount }, () => worker()));

      const settled = outcomes.map(
        (outcome, index): BatchOutcome =>
          outcome ?? {
            index,
            offset: index * this.batchSize,
            size: batches[index].length,
            status: 'skipped',
            attempts: 0,
          },
      );

      return this.summarize(destination, records.length, 0, settled, state);
    });
  }

  /**
   * Write records from an async source (typically a hub subscription), batching as
   * they arrive and flushing the remainder at end-of-stream. A source that throws
   * still has its buffered records written; the error is reported as `sourceError`.
   * When the source is a `Subscription`, records the hub dropped for it are counted
   * in `droppedRecords`.
   */
  async writeStream(source: AsyncIterable<R>, destination: string): Promise<BatchIngestResult> {
    return requestContext.run({ destination }, async () => {
      const state: RunState = { writeCalls: 0 };
      const outcomes: BatchOutcome[] = [];
      let buffer: R[] = [];
      let consumed = 0;
      let stopped = false;
      let sourceError: Error | undefined;

      const flush = async (): Promise<void> => {
        if (buffer.length === 0) return;
        const batch = buffer;
        buffer = [];
        const outcome = await this.writeBatch(batch, outcomes.length, consumed - batch.length, destination, state);
        outcomes.push(outcome);
        if (outcome.status !== 'written' && this.stopOnFailure) {
          stopped = true;
        }
      };

      try {
        for await (const record of source) {
          buffer.push(record);
          consumed += 1;
          if (buffer.length === this.batchSize) {
            await flush();
            if (stopped) break;
          }
        }
      } catch (error) {
        sourceError = toError(error);
        logger.warn({ err: sourceError, destination }, 'Source ended with an error; flushing buffered records');
      }

      if (!stopped) {
        await flush();
      }

      const droppedRecords = source instanceof Subscription ? source.droppedCount : 0;
      const result = this.summarize(destination, consumed, droppedRecords, outcomes, state);
      return sourceError ? { ...result, sourceError } : result;
    });
  }

  /**
   * Subscribe to a hub and write everything it delivers until it ends
   */
  drainHub(hub: BroadcastHub<R>, destination: string, options: SubscribeOptions = {}): Promise<BatchIngestResult> {
    const subscription = hub.subscribe({ label: `ingest:${destination}`, ...options });
    return this.writeStream(subscription, destination);
  }

  private async writeBatch(
    records: readonly R[],
    index: number,
    offset: number,
    destination: string,
    state: RunState,
  ): Promise<BatchOutcome> {
    let attempts = 0;

    for (;;) {
      attempts += 1;
      state.writeCalls += 1;
      const startedAt = Date.now();

      try {
        await withSpan(
          'livehub.ingest.batch_write',
          {
            'livehub.ingest.destination': destination,
            'livehub.ingest.batch_index': index,
            'livehub.ingest.batch_size': records.length,
            'livehub.ingest.attempt': attempts,
          },
          () => this.target.writeBatch(destination, records),
        );
        recordBatchWrite(Date.now() - startedAt, { destination, status: 'written' });
        logger.debug({ destination, batchIndex: index, size: records.length, attempts }, 'Batch written');
        return { index, offset, size: records.length, status: 'written', attempts };
      } catch (error) {
        const failure = toBatchWriteError(error, destination);
        const rejected = failure instanceof BatchWriteRejectedError;
        recordBatchWrite(Date.now() - startedAt, { destination, status: rejected ? 'rejected' : 'failed' });

        if (failure instanceof BatchWriteRejectedError && attempts <= this.maxRetries) {
          const delayMs = this.backoff(attempts, failure.retryAfterMs);
          logger.warn(
            { destination, batchIndex: index, attempt: attempts, delayMs },
            'Batch rejected by destination; retrying',
          );
          await this.sleep(delayMs);
          continue;
        }

        logger.error(
          { err: failure, destination, batchIndex: index, size: records.length, attempts },
          rejected ? 'Batch still rejected after retries' : 'Batch write failed',
        );
        return {
          index,
          offset,
          size: records.length,
          status: rejected ? 'rejected' : 'failed',
          attempts,
          error: failure,
        };
      }
    }
  }

  private backoff(attempt: number, retryAfterMs?: number): number {
    const exponential = this.retryBaseMs * 2 ** (attempt - 1);
    return Math.min(this.retryMaxMs, Math.max(exponential, retryAfterMs ?? 0));
  }

  private summarize(
    destination: string,
    totalRecords: number,
    droppedRecords: number,
    batches: BatchOutcome[],
    state: RunState,
  ): BatchIngestResult {
    let writtenRecords = 0;
    let failedRecords = 0;
    let skippedRecords = 0;

    for (const batch of batches) {
      if (batch.status === 'written') writtenRecords += batch.size;
      else if (batch.status === 'skipped') skippedRecords += batch.size;
      else failedRecords += batch.size;
    }

    const result: BatchIngestResult = {
      destination,
      totalRecords,
      writtenRecords,
      failedRecords,
      skippedRecords,
      droppedRecords,
      writeCalls: state.writeCalls,
      batches,
    };

    const summary = {
      destination,
      totalRecords,
      writtenRecords,
      failedRecords,
      skippedRecords,
      droppedRecords,
      writeCalls: state.writeCalls,
    };
    if (failedRecords > 0) {
      logger.warn(summary, 'Batch ingestion finished with failed batches');
    } else if (droppedRecords > 0) {
      logger.warn(summary, 'Batch ingestion finished; the source dropped records');
    } else {
      logger.info(summary, 'Batch ingestion finished');
    }

    return result;
  }
}

/**
 * Expand a batch result into one entry per input record
 */
export function toRecordResults(result: BatchIngestResult): RecordResult[] {
  const records: RecordResult[] = [];

  for (const batch of result.batches) {
    const status = batch.status === 'written' ? 'written' : batch.status === 'skipped' ? 'skipped' : 'failed';
    for (let position = 0; position < batch.size; position += 1) {
      records.push({
        index: batch.offset + position,
        batchIndex: batch.index,
        status,
        ...(batch.error ? { error: batch.error } : {}),
      });
    }
  }

  return records;
}
