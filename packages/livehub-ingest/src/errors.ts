/**
 * Error classes for batch ingestion
 */

import { LiveHubError } from '@livehub/core';

/**
 * Base error class for ingestion errors
 */
export class IngestError extends LiveHubError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IngestError';
  }
}

/**
 * A destination refused or failed to store a batch
 */
export class BatchWriteError extends IngestError {
  public readonly destination: string;

  constructor(destination: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BatchWriteError';
    this.destination = destination;
  }
}

/**
 * The destination's admission queue turned the batch away; the same batch may be
 * re-sent after a backoff
 */
export class BatchWriteRejectedError extends BatchWriteError {
  /** Delay the destination asked for, when it gave one */
  public readonly retryAfterMs?: number;

  constructor(destination: string, message: string, options?: ErrorOptions & { retryAfterMs?: number }) {
    super(destination, message, options);
    this.name = 'BatchWriteRejectedError';
    this.retryAfterMs = options?.retryAfterMs;
  }
}
