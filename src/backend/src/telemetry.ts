import { type Span, SpanStatusCode, metrics, trace } from '@opentelemetry/api';

// No-op until the SDK in instrumentation.ts registers real providers
const tracer = trace.getTracer('blackjack-ev-trainer');
const meter = metrics.getMeter('blackjack-ev-trainer');

export const recommendationDuration = meter.createHistogram('advisor.recommendation.duration', {
  description: 'Time spent computing a strategy recommendation',
  unit: 'ms',
});

export function withSpan<T>(name: string, fn: (span: Span) => T): T {
  return tracer.startActiveSpan(name, span => {
    try {
      return fn(span);
    } catch (error) {
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });
}
