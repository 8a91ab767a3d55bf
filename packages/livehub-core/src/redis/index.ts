export { createRedisChannelHub, publishToRedis } from './redisBridge.js';
export type {
  DistributedEventMessage,
  RedisChannelHubConfig,
  RedisPublishConfig,
  RedisPubSubClient,
} from './types.js';
