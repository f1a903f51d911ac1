/**
 * OpenTelemetry observability adapter
 *
 * Opens one span per request and closes it on response or transport error.
 * The tracer and meter are structural subsets of the @opentelemetry/api
 * types, so any configured SDK instance can be passed in:
 *
 * ```typescript
 * import { trace, metrics } from "@opentelemetry/api";
 *
 * const client = new CouchClient({
 *   host: "localhost",
 *   database: "orders",
 *   observability: new OpenTelemetryObservability({
 *     tracer: trace.getTracer("couchwire"),
 *     meter: metrics.getMeter("couchwire"),
 *   }),
 * });
 * ```
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export interface OTelTracer {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpan;
}

export interface OTelSpan {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  recordException(exception: Error): void;
  end(): void;
}

export interface OTelMeter {
  createCounter(name: string, options?: { description?: string }): OTelCounter;
  createHistogram(name: string, options?: { description?: string; unit?: string }): OTelHistogram;
}

export interface OTelCounter {
  add(value: number, attributes?: Record<string, string>): void;
}

export interface OTelHistogram {
  record(value: number, attributes?: Record<string, string>): void;
}

export interface OpenTelemetryConfig {
  tracer: OTelTracer;
  meter: OTelMeter;
  /** Prefix for instrument names (default: "couchwire") */
  metricPrefix?: string;
  /** Sink for feed warnings; defaults to console.warn */
  warn?: (message: string, metadata?: Record<string, unknown>) => void;
}

const SpanStatusCode = {
  UNSET: 0,
  OK: 1,
  ERROR: 2,
} as const;

export class OpenTelemetryObservability implements ObservabilityAdapter {
  private readonly tracer: OTelTracer;
  private readonly metricPrefix: string;
  private readonly requestCounter: OTelCounter;
  private readonly errorCounter: OTelCounter;
  private readonly durationHistogram: OTelHistogram;
  private readonly warn: (message: string, metadata?: Record<string, unknown>) => void;
  private readonly activeSpans: Map<string, OTelSpan> = new Map();

  constructor(config: OpenTelemetryConfig) {
    this.tracer = config.tracer;
    this.metricPrefix = config.metricPrefix ?? "couchwire";
    this.warn = config.warn ?? ((message, metadata) => console.warn(`[couchwire] ${message}`, metadata ?? {}));

    this.requestCounter = config.meter.createCounter(`${this.metricPrefix}.requests`, {
      description: "CouchDB requests sent",
    });
    this.errorCounter = config.meter.createCounter(`${this.metricPrefix}.errors`, {
      description: "CouchDB requests that failed in transport",
    });
    this.durationHistogram = config.meter.createHistogram(`${this.metricPrefix}.duration`, {
      description: "Time to response headers",
      unit: "ms",
    });
  }

  /** Spans still waiting for a response or error */
  get openSpans(): number {
    return this.activeSpans.size;
  }

  logRequest(context: RequestContext): void {
    const span = this.tracer.startSpan(`couchdb ${context.method}`, {
      attributes: {
        "db.system": "couchdb",
        "db.name": context.database,
        "http.method": context.method,
        "http.url": context.uri,
        "couchwire.request_id": context.requestId,
      },
    });
    this.activeSpans.set(context.requestId, span);

    this.requestCounter.add(1, {
      database: context.database,
      method: context.method,
    });
  }

  logResponse(context: ResponseContext): void {
    const span = this.activeSpans.get(context.requestId);
    if (span) {
      span.setAttribute("http.status_code", context.statusCode);
      span.setAttribute("couchwire.duration_ms", context.duration);
      // Status classification belongs to the interpreter; a 404 is still a completed call.
      span.setStatus({ code: SpanStatusCode.OK });
      span.end();
      this.activeSpans.delete(context.requestId);
    }

    this.durationHistogram.record(context.duration, {
      database: context.database,
      method: context.method,
      status: String(context.statusCode),
    });
  }

  logError(context: ErrorContext): void {
    const span = this.activeSpans.get(context.requestId);
    if (span) {
      span.setAttribute("couchwire.error.category", context.error.category);
      span.setAttribute("couchwire.duration_ms", context.duration);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: context.error.message,
      });

      const error = new Error(context.error.message);
      error.name = context.error.name;
      span.recordException(error);

      span.end();
      this.activeSpans.delete(context.requestId);
    }

    this.errorCounter.add(1, {
      database: context.database,
      category: context.error.category,
    });
    this.durationHistogram.record(context.duration, {
      database: context.database,
      method: context.method,
      status: "error",
    });
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.warn(message, metadata);
  }

  recordMetric(_metric: Metric): void {
    // Request count and duration already come from the span hooks above.
  }
}
