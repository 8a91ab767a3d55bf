import { parseEnv } from '@livehub/core';
import { z } from 'zod';

const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const ingestEnvSchema = z.object({
  INGEST_BATCH_SIZE: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(100)),
  INGEST_MAX_RETRIES: z.preprocess(emptyAsUndefined, z.coerce.number().int().nonnegative().default(5)),
  INGEST_RETRY_BASE_MS: z.preprocess(emptyAsUndefined, z.coerce.number().int().nonnegative().default(200)),
  INGEST_RETRY_MAX_MS: z.preprocess(emptyAsUndefined, z.coerce.number().int().nonnegative().default(10_000)),
});

export interface IngestSettings {
  batchSize: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
}

/**
 * Batch ingestion defaults from the environment
 *
 * @throws LiveHubConfigError naming the offending variable
 */
export function resolveIngestSettings(env: NodeJS.ProcessEnv = process.env): IngestSettings {
  const parsed = parseEnv(ingestEnvSchema, env);

  return {
    batchSize: parsed.INGEST_BATCH_SIZE,
    maxRetries: parsed.INGEST_MAX_RETRIES,
    retryBaseMs: parsed.INGEST_RETRY_BASE_MS,
    retryMaxMs: parsed.INGEST_RETRY_MAX_MS,
  };
}
