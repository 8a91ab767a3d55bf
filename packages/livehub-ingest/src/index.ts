export { BatchWriter, toRecordResults } from './batchWriter.js';
export { SupabaseBatchDestination, type SupabaseBatchDestinationOptions } from './supabaseDestination.js';
export { resolveIngestSettings, type IngestSettings } from './config.js';
export { BatchWriteError, BatchWriteRejectedError, IngestError } from './errors.js';
export type {
  BatchDestination,
  BatchIngestResult,
  BatchOutcome,
  BatchStatus,
  BatchWriterOptions,
  RecordResult,
} from './types.js';
