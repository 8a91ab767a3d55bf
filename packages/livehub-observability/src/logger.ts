import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { trace } from '@opentelemetry/api';
import { z } from 'zod';
import { requestContext } from './requestContext.js';

export type LoggerBindings = {
  component?: string;
  destination?: DestinationStream;
} & Record<string, unknown>;

export type { Logger };

export class LoggerConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.name = 'LoggerConfigError';
    this.variable = variable;
  }
}

const logLevelSchema = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
);

/**
 * Level from `LOG_LEVEL`, `info` when unset
 *
 * @throws LoggerConfigError for a level pino does not know
 */
export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env) => {
  const result = logLevelSchema.safeParse(env.LOG_LEVEL);
  if (!result.success) {
    throw new LoggerConfigError('LOG_LEVEL', result.error.issues[0]?.message ?? result.error.message);
  }
  return result.data;
};

// Track all logger instances for graceful shutdown
const loggerInstances = new Set<Logger>();

const buildCorrelationFields = () => {
  const correlation: Record<string, unknown> = {};
  const span = trace.getActiveSpan();
  const spanContext = span?.spanContext();

  if (spanContext && trace.isSpanContextValid(spanContext)) {
    correlation.trace_id = spanContext.traceId;
    correlation.span_id = spanContext.spanId;
  }

  Object.entries(requestContext.get()).forEach(([key, value]) => {
    if (value !== undefined) {
      correlation[key] = value;
    }
  });

  return correlation;
};

export const createLogger = (scope: string, bindings: LoggerBindings = {}): Logger => {
  const { destination, ...staticBindings } = bindings;
  const level = resolveLogLevel();

  const options: LoggerOptions = {
    level,
    base: {
      scope,
      ...staticBindings,
      component: bindings.component ?? scope,
    },
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (value) => value,
    },
    mixin() {
      return buildCorrelationFields();
    },
  };

  // Async destination keeps log writes off the delivery path
  const logger = pino(options, destination ?? pino.destination({ sync: false }));

  loggerInstances.add(logger);

  return logger;
};

/**
 * Flushes all logger instances so buffered lines are written before exit.
 */
export const flushLoggers = async (): Promise<void> => {
  const flushPromises = Array.from(loggerInstances).map(
    (logger) =>
      new Promise<void>((resolve) => {
        logger.flush((err) => {
          if (err) {
            // Logging through pino here could recurse into the failing stream
            console.error('Failed to flush logger:', err);
          }
          resolve();
        });
      })
  );

  await Promise.all(flushPromises);
};
