/**
 * Console observability adapter: one JSON object per line on stdout.
 * Warnings and errors go to the matching console level.
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export interface ConsoleObservabilityConfig {
  /** Indented output instead of one line per event */
  pretty?: boolean;
}

export class ConsoleObservability implements ObservabilityAdapter {
  private config: ConsoleObservabilityConfig;

  constructor(config: ConsoleObservabilityConfig = {}) {
    this.config = config;
  }

  logRequest(context: RequestContext): void {
    const log = {
      level: "info",
      type: "request",
      database: context.database,
      uri: context.uri,
      method: context.method,
      requestId: context.requestId,
      headers: context.headers,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logResponse(context: ResponseContext): void {
    const log = {
      level: "info",
      type: "response",
      database: context.database,
      uri: context.uri,
      method: context.method,
      requestId: context.requestId,
      statusCode: context.statusCode,
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logError(context: ErrorContext): void {
    const log = {
      level: "error",
      type: "error",
      database: context.database,
      uri: context.uri,
      method: context.method,
      requestId: context.requestId,
      error: {
        category: context.error.category,
        message: context.error.message,
        name: context.error.name,
      },
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    };

    this.output(log);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    const log = {
      level: "warn",
      type: "warning",
      message,
      metadata,
      timestamp: new Date().toISOString(),
    };

    this.output(log);
  }

  recordMetric(metric: Metric): void {
    const log = {
      level: "info",
      type: "metric",
      name: metric.name,
      value: metric.value,
      tags: metric.tags,
      timestamp: metric.timestamp.toISOString(),
    };

    this.output(log);
  }

  private output(data: { level: string }): void {
    const line = this.config.pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
    if (data.level === "error") {
      console.error(line);
    } else if (data.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

