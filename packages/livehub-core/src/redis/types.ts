/**
 * Redis client interfaces for hub pub/sub bridges
 *
 * Structural, so an ioredis or node-redis wrapper (or an in-process fake) can be
 * passed without this package depending on a Redis driver.
 */

/**
 * Pub/sub client interface for publishing and subscribing to Redis channels
 */
export interface RedisPubSubClient {
  /**
   * Publish a message to a channel
   * @returns The number of clients that received the message (or void for some implementations)
   */
  publish(channel: string, message: string): Promise<number | void>;

  /**
   * Subscribe to a channel
   * @param handler Callback invoked for each message received
   */
  subscribe(channel: string, handler: (message: string) => void): Promise<void>;

  unsubscribe(channel: string): Promise<void>;
}

/**
 * Envelope carried on every bridged channel
 */
export interface DistributedEventMessage<TEvent extends string = string> {
  event: TEvent;
  data: unknown;
  timestamp: number;
  instanceId?: string;
}

export interface RedisChannelHubConfig<T> {
  /** Subscriber connection; Redis requires it to be dedicated to pub/sub */
  client: RedisPubSubClient;
  channel: string;
  /** Turns an envelope's `data` into a hub element; a throw skips the message */
  parse: (data: unknown) => T;
  /**
   * Messages carrying this instance id are ignored
   * If not provided, one will be generated automatically
   */
  instanceId?: string;
  /** Only envelopes with this event name are forwarded */
  event?: string;
}

export interface RedisPublishConfig {
  client: RedisPubSubClient;
  channel: string;
  event: string;
  instanceId?: string;
}
