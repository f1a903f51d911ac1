import { describe, it, expect } from "vitest";
import {
  OpenTelemetryObservability,
  type OTelCounter,
  type OTelHistogram,
  type OTelMeter,
  type OTelSpan,
  type OTelTracer,
} from "./otel.js";

class RecordingSpan implements OTelSpan {
  readonly attributes: Record<string, string | number | boolean> = {};
  status: { code: number; message?: string } | undefined;
  exceptions: Error[] = [];
  ended = false;

  constructor(readonly name: string, initial: Record<string, string | number | boolean>) {
    Object.assign(this.attributes, initial);
  }

  setAttribute(key: string, value: string | number | boolean): this {
    this.attributes[key] = value;
    return this;
  }

  setStatus(status: { code: number; message?: string }): this {
    this.status = status;
    return this;
  }

  recordException(exception: Error): void {
    this.exceptions.push(exception);
  }

  end(): void {
    this.ended = true;
  }
}

class RecordingTelemetry implements OTelTracer, OTelMeter {
  readonly spans: RecordingSpan[] = [];
  readonly counts: Record<string, Array<{ value: number; attributes: Record<string, string> | undefined }>> = {};

  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpan {
    const span = new RecordingSpan(name, options?.attributes ?? {});
    this.spans.push(span);
    return span;
  }

  createCounter(name: string): OTelCounter {
    return { add: (value, attributes) => this.push(name, value, attributes) };
  }

  createHistogram(name: string): OTelHistogram {
    return { record: (value, attributes) => this.push(name, value, attributes) };
  }

  private push(name: string, value: number, attributes: Record<string, string> | undefined): void {
    (this.counts[name] ??= []).push({ value, attributes });
  }
}

const base = {
  database: "orders",
  method: "GET" as const,
  uri: "http://localhost:5984/orders/a",
  requestId: "r1",
};

describe("OpenTelemetryObservability", () => {
  it("opens a span per request and closes it on response", () => {
    const telemetry = new RecordingTelemetry();
    const otel = new OpenTelemetryObservability({ tracer: telemetry, meter: telemetry });

    otel.logRequest({ ...base, headers: {}, timestamp: new Date() });
    expect(otel.openSpans).toBe(1);
    otel.logResponse({ ...base, statusCode: 200, duration: 7, timestamp: new Date() });

    const span = telemetry.spans[0];
    expect(span?.name).toBe("couchdb GET");
    expect(span?.attributes).toEqual({
      "db.system": "couchdb",
      "db.name": "orders",
      "http.method": "GET",
      "http.url": "http://localhost:5984/orders/a",
      "couchwire.request_id": "r1",
      "http.status_code": 200,
      "couchwire.duration_ms": 7,
    });
    expect(span?.status).toEqual({ code: 1 });
    expect(span?.ended).toBe(true);
    expect(otel.openSpans).toBe(0);
    expect(telemetry.counts["couchwire.requests"]).toEqual([
      { value: 1, attributes: { database: "orders", method: "GET" } },
    ]);
    expect(telemetry.counts["couchwire.duration"]).toEqual([
      { value: 7, attributes: { database: "orders", method: "GET", status: "200" } },
    ]);
  });

  it("marks the span failed on a transport error", () => {
    const telemetry = new RecordingTelemetry();
    const otel = new OpenTelemetryObservability({ tracer: telemetry, meter: telemetry, metricPrefix: "db" });

    otel.logRequest({ ...base, headers: {}, timestamp: new Date() });
    otel.logError({
      ...base,
      error: { category: "transport", message: "socket hang up", name: "TransportError" },
      duration: 3,
      timestamp: new Date(),
    });

    const span = telemetry.spans[0];
    expect(span?.status).toEqual({ code: 2, message: "socket hang up" });
    expect(span?.exceptions.map((e) => e.name)).toEqual(["TransportError"]);
    expect(span?.ended).toBe(true);
    expect(telemetry.counts["db.errors"]).toEqual([
      { value: 1, attributes: { database: "orders", category: "transport" } },
    ]);
  });

  it("forwards warnings to the configured sink", () => {
    const telemetry = new RecordingTelemetry();
    const warnings: string[] = [];
    const otel = new OpenTelemetryObservability({
      tracer: telemetry,
      meter: telemetry,
      warn: (message) => warnings.push(message),
    });

    otel.logWarning("feed stopped");

    expect(warnings).toEqual(["feed stopped"]);
  });
});
