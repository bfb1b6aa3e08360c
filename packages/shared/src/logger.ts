import pino from 'pino';
import { trace } from '@opentelemetry/api';

export type { Logger } from 'pino';

export const logger = pino({
  name: 'tessera',
  level: process.env.LOG_LEVEL ?? 'info',
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
});
