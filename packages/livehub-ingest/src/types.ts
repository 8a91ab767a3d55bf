import type { BatchWriteError } from './errors.js';

/**
 * Anything that can store a batch of records in one call
 *
 * `writeBatch` resolves only once the destination acknowledged every record of the
 * batch. Throw `BatchWriteRejectedError` for an admission-queue rejection the
 * writer should retry; anything else fails the batch.
 */
export interface BatchDestination<R> {
  writeBatch(destination: string, records: readonly R[]): Promise<void>;
}

/**
 * - `written`: acknowledged by the destination
 * - `rejected`: still rejected after every retry
 * - `failed`: a non-retryable error
 * - `skipped`: never attempted because an earlier batch failed under `stopOnFailure`
 */
export type BatchStatus = 'written' | 'rejected' | 'failed' | 'skipped';

export interface BatchOutcome {
  index: number;
  /** Position of the batch's first record in the input */
  offset: number;
  size: number;
  status: BatchStatus;
  attempts: number;
  error?: BatchWriteError;
}

export interface BatchIngestResult {
  destination: string;
  totalRecords: number;
  writtenRecords: number;
  /** Records in rejected or failed batches */
  failedRecords: number;
  skippedRecords: number;
  /** Records the hub discarded before the writer read them (drop overflow policies) */
  droppedRecords: number;
  /** Every call to `writeBatch`, retries included */
  writeCalls: number;
  batches: BatchOutcome[];
  /** Set when a streamed source ended with an error instead of end-of-stream */
  sourceError?: Error;
}

export interface RecordResult {
  index: number;
  batchIndex: number;
  status: 'written' | 'failed' | 'skipped';
  error?: BatchWriteError;
}

export interface BatchWriterOptions {
  /** Records per write. Defaults to `INGEST_BATCH_SIZE` */
  batchSize?: number;
  /** Retries per rejected batch. Defaults to `INGEST_MAX_RETRIES` */
  maxRetries?: number;
  /** First backoff delay. Defaults to `INGEST_RETRY_BASE_MS` */
  retryBaseMs?: number;
  /** Backoff cap. Defaults to `INGEST_RETRY_MAX_MS` */
  retryMaxMs?: number;
  /** Batches in flight at once. @default 1 */
  maxConcurrency?: number;
  /** Skip the remaining batches after the first batch that is not written. @default false */
  stopOnFailure?: boolean;
  sleep?: (ms: number) => Promise<void>;
}
