/**
 * Hub Metrics - OpenTelemetry instruments for live hubs and batch ingestion
 *
 * Provides instrumentation for:
 * - Element fan-out (pushed, dropped by overflow policy)
 * - Subscription churn (active subscriptions per hub)
 * - Hub terminations by outcome
 * - Batch writes and their latency
 *
 * Instruments are no-ops until `initHubMetrics()` runs, so libraries can record
 * unconditionally and applications opt in once their meter provider is set.
 */

import { metrics, type Counter, type Histogram, type UpDownCounter } from '@opentelemetry/api';

let elementsPushedCounter: Counter | null = null;
let elementsDroppedCounter: Counter | null = null;
let activeSubscriptionsCounter: UpDownCounter | null = null;
let hubTerminationCounter: Counter | null = null;
let batchWriteCounter: Counter | null = null;
let batchWriteDurationHistogram: Histogram | null = null;

export const initHubMetrics = (): void => {
  const meter = metrics.getMeter('livehub-metrics', '1.0.0');

  elementsPushedCounter = meter.createCounter('livehub.hub.elements.pushed', {
    description: 'Elements accepted by a hub inlet',
    unit: '{elements}',
  });

  elementsDroppedCounter = meter.createCounter('livehub.hub.elements.dropped', {
    description: 'Elements discarded for a subscription by a drop overflow policy',
    unit: '{elements}',
  });

  activeSubscriptionsCounter = meter.createUpDownCounter('livehub.hub.subscriptions.active', {
    description: 'Subscriptions currently attached to a hub',
    unit: '{subscriptions}',
  });

  hubTerminationCounter = meter.createCounter('livehub.hub.terminations', {
    description: 'Hubs that reached a terminal state, by outcome',
    unit: '{hubs}',
  });

  batchWriteCounter = meter.createCounter('livehub.ingest.batch.writes', {
    description: 'Batch write calls issued to a destination, by status',
    unit: '{writes}',
  });

  batchWriteDurationHistogram = meter.createHistogram('livehub.ingest.batch.duration', {
    description: 'Duration of a single batch write in milliseconds',
    unit: 'ms',
  });
};

export const recordElementPushed = (attributes: { hub: string }): void => {
  elementsPushedCounter?.add(1, attributes);
};

export const recordElementsDropped = (
  count: number,
  attributes: { hub: string; policy: string }
): void => {
  elementsDroppedCounter?.add(count, attributes);
};

export const recordSubscriptionChange = (delta: 1 | -1, attributes: { hub: string }): void => {
  activeSubscriptionsCounter?.add(delta, attributes);
};

export const recordHubTerminated = (attributes: {
  hub: string;
  outcome: 'completed' | 'failed';
  reason: string;
}): void => {
  hubTerminationCounter?.add(1, attributes);
};

export const recordBatchWrite = (
  durationMs: number,
  attributes: { destination: string; status: 'written' | 'rejected' | 'failed' }
): void => {
  batchWriteCounter?.add(1, attributes);
  batchWriteDurationHistogram?.record(durationMs, attributes);
};
