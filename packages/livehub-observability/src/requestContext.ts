import { AsyncLocalStorage } from 'node:async_hooks';
import { type Span, trace } from '@opentelemetry/api';

export interface RequestContextValues {
  hubName?: string;
  subscriptionId?: string;
  destination?: string;
  requestId?: string;
  [key: string]: string | undefined;
}

const attributeMap: Record<string, string> = {
  hubName: 'livehub.hub.name',
  subscriptionId: 'livehub.subscription.id',
  destination: 'livehub.ingest.destination',
  requestId: 'app.request.id',
};

const requestContextStorage = new AsyncLocalStorage<RequestContextValues>();

const setSpanAttributes = (span: Span | undefined, values: RequestContextValues) => {
  if (!span) return;

  Object.entries(values).forEach(([key, value]) => {
    if (value) {
      span.setAttribute(attributeMap[key] ?? `livehub.context.${key}`, value);
    }
  });
};

const mergeWithStore = (values: RequestContextValues): RequestContextValues => ({
  ...(requestContextStorage.getStore() ?? {}),
  ...values,
});

export const requestContext = {
  run<T>(values: RequestContextValues, fn: () => T): T {
    const merged = mergeWithStore(values);
    setSpanAttributes(trace.getActiveSpan(), values);

    return requestContextStorage.run(merged, fn);
  },
  get(): RequestContextValues {
    return requestContextStorage.getStore() ?? {};
  },
  applyToSpan(span: Span | undefined): void {
    setSpanAttributes(span, requestContextStorage.getStore() ?? {});
  },
};
