import { createLogger } from '@livehub/observability';
import { z } from 'zod';
import { BroadcastHub } from '../broadcastHub.js';
import { toError } from '../errors.js';
import type { HubOptions } from '../types.js';
import { generateInstanceId } from '../utils.js';
import type { DistributedEventMessage, RedisChannelHubConfig, RedisPublishConfig } from './types.js';

const logger = createLogger('RedisBridge');

const envelopeSchema = z.object({
  event: z.string(),
  data: z.unknown(),
  timestamp: z.number(),
  instanceId: z.string().optional(),
});

/**
 * A hub whose producer is a Redis pub/sub channel
 *
 * ## Architecture
 *
 * ```
 * Instance 1: publishToRedis(hub) → Redis channel "{channel}"
 *                                       ↓
 * Instance 2: createRedisChannelHub → inlet.push → local subscriptions
 * ```
 *
 * - Messages published with this bridge's `instanceId` are ignored.
 * - Malformed envelopes and payloads rejected by `parse` are logged and skipped;
 *   they never fail the hub.
 * - Hub termination unsubscribes from the channel.
 *
 * @throws Whatever `client.subscribe` rejects with; the hub is failed first
 */
export async function createRedisChannelHub<T>(
  config: RedisChannelHubConfig<T>,
  hubOptions: HubOptions = {},
): Promise<BroadcastHub<T>> {
  const { client, channel } = config;
  const instanceId = config.instanceId ?? generateInstanceId();
  const hub = new BroadcastHub<T>({ ...hubOptions, name: hubOptions.name ?? `redis:${channel}` });
  const inlet = hub.openInlet();
  const log = logger.child({ hubName: hub.name, channel });

  const handleMessage = (message: string): void => {
    if (inlet.closed) return;

    let raw: unknown;
    try {
      raw = JSON.parse(message);
    } catch (error) {
      log.warn({ err: toError(error) }, 'Skipping malformed message');
      return;
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      log.warn({ issues: envelope.error.issues }, 'Skipping message with invalid envelope');
      return;
    }

    // Filter out self-published messages
    if (envelope.data.instanceId === instanceId) return;
    if (config.event !== undefined && envelope.data.event !== config.event) return;

    let element: T;
    try {
      element = config.parse(envelope.data.data);
    } catch (error) {
      log.warn({ err: toError(error), event: envelope.data.event }, 'Skipping message rejected by parser');
      return;
    }

    inlet.push(element);
  };

  try {
    await client.subscribe(channel, handleMessage);
  } catch (error) {
    log.error({ err: toError(error) }, 'Error setting up Redis subscription');
    if (!inlet.closed) {
      inlet.fail(error);
    }
    throw error;
  }

  log.info({ instanceId }, 'Subscribed to Redis channel');

  void hub
    .whenTerminated()
    .then(async () => {
      await client.unsubscribe(channel);
      log.info('Unsubscribed from Redis channel');
    })
    .catch((error: unknown) => {
      log.warn({ err: toError(error) }, 'Error unsubscribing from Redis channel');
    });

  return hub;
}

/**
 * Publish every element of a hub to a Redis channel (fire and forget)
 *
 * Publish failures are logged and never reach the hub or its producer.
 *
 * @returns A function that stops publishing
 */
export function publishToRedis<T>(hub: BroadcastHub<T>, config: RedisPublishConfig): () => void {
  const { client, channel, event } = config;
  const instanceId = config.instanceId ?? generateInstanceId();
  const log = logger.child({ hubName: hub.name, channel });

  return hub.tap({
    next(value) {
      const envelope: DistributedEventMessage = {
        event,
        data: value,
        timestamp: Date.now(),
        instanceId,
      };

      let message: string;
      try {
        message = JSON.stringify(envelope);
      } catch (error) {
        log.warn({ err: toError(error) }, 'Skipping element that cannot be serialized');
        return;
      }

      void client.publish(channel, message).catch((error: unknown) => {
        log.error({ err: toError(error) }, 'Error publishing to Redis');
      });
    },
  });
}
