/**
 * Silent observability adapter, for tests and for callers that opt out
 * of the console default.
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export class NoOpObservability implements ObservabilityAdapter {
  logRequest(_context: RequestContext): void {}

  logResponse(_context: ResponseContext): void {}

  logError(_context: ErrorContext): void {}

  logWarning(_message: string, _metadata?: Record<string, unknown>): void {}

  recordMetric(_metric: Metric): void {}
}
