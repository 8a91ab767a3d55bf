import { SpanStatusCode, trace, type Attributes } from '@opentelemetry/api';
import { requestContext } from './requestContext.js';

const tracer = trace.getTracer('livehub-observability');

/**
 * Runs `fn` inside an active span. Spans are recorded only when the host
 * application registered a tracer provider; otherwise the API no-op tracer applies.
 */
export const withSpan = async <T>(
  name: string,
  attributes: Attributes,
  fn: () => Promise<T> | T
): Promise<T> => {
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    requestContext.applyToSpan(span);

    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });
};
