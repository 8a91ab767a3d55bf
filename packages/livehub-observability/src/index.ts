export { createLogger, flushLoggers, LoggerConfigError, resolveLogLevel } from './logger.js';
export { requestContext, type RequestContextValues } from './requestContext.js';
export { withSpan } from './tracing.js';
export {
  initHubMetrics,
  recordElementPushed,
  recordElementsDropped,
  recordSubscriptionChange,
  recordHubTerminated,
  recordBatchWrite,
} from './hubMetrics.js';
export type { Logger, LoggerBindings } from './logger.js';
