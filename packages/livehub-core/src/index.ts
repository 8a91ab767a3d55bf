export { BroadcastHub, type SourceStart, type SourceTeardown } from './broadcastHub.js';
export { Inlet } from './inlet.js';
export { Subscription } from './subscription.js';
export { SubscriptionRegistry } from './subscriptionRegistry.js';
export { KeepAliveAnchor } from './keepAliveAnchor.js';
export { deriveHub } from './derivedView.js';
export {
  filterStage,
  mapStage,
  scanStage,
  slidingWindow,
  timeWindow,
  tumblingWindow,
  type Emit,
  type Stage,
  type TimeWindow,
} from './stages.js';
export { HubRegistry } from './hubRegistry.js';
export { fromAsyncIterable, fromCallbackSource, type SourceListener, type Unsubscribe } from './sources.js';
export { parseEnv, resolveHubOptions, type HubEnv } from './config.js';
export {
  DeliveryFailedError,
  HubFailedError,
  LiveHubConfigError,
  LiveHubError,
  ProducerContractViolationError,
  SubscriberOverflowError,
  getErrorMessage,
  toError,
} from './errors.js';
export { generateInstanceId } from './utils.js';
export * from './redis/index.js';
export { OVERFLOW_POLICIES } from './types.js';
export type {
  DeliveryTarget,
  HealthCheckResult,
  HubOptions,
  HubOutcome,
  HubSink,
  HubState,
  HubStats,
  OfferResult,
  OverflowPolicy,
  SubscribeOptions,
  SubscriptionSignal,
  SubscriptionState,
  TargetKind,
} from './types.js';
