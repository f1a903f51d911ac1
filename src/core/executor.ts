/**
 * Request executor
 * Flow: headers → observability → transport.send → observability
 *
 * The executor never retries and never reads bodies. Whatever it returns
 * must be handed to the ResponseInterpreter (or aborted) by the caller.
 */

import type {
  ConnectionContext,
  ErrorContext,
  HttpMethod,
  Metric,
  ObservabilityAdapter,
  RequestBody,
  RequestContext,
  ResponseContext,
  SanitizerOptions,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./types.js";
import { CouchError, TransportError } from "./errors.js";
import { sanitizeMetric, sanitizeObject } from "./observability-sanitizer.js";
import { isJsonObject } from "./shapes.js";
import { sanitizeRequestHeaders, sanitizeUri } from "./request-sanitizer.js";
import { getUserAgent } from "./versioning.js";
import { randomUUID } from "crypto";

export const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

export interface ExecutorConfig {
  context: ConnectionContext;
  transport: Transport;
  observability: ObservabilityAdapter[];
  timeout?: number;
  sanitizerOptions?: SanitizerOptions;
}

/**
 * Builds the Authorization header value for the context's credentials.
 */
export function authorizationHeader(context: ConnectionContext): string | undefined {
  const auth = context.auth;
  if (!auth) {
    return undefined;
  }
  if ("token" in auth) {
    return `Bearer ${auth.token}`;
  }
  const encoded = Buffer.from(`${auth.username}:${auth.password}`, "utf8").toString("base64");
  return `Basic ${encoded}`;
}

export class RequestExecutor {
  private config: ExecutorConfig;
  private readonly authorization: string | undefined;

  constructor(config: ExecutorConfig) {
    this.config = config;
    this.authorization = authorizationHeader(config.context);
  }

  /**
   * Broadcasts an observability event to every adapter in isolation.
   * Adapter failures are aggregated to console.error and never reach the
   * caller (not to other adapters either, to avoid loops).
   */
  broadcast(action: (adapter: ObservabilityAdapter) => void, actionName: string): void {
    const errors: Array<{ adapter: string; error: unknown }> = [];

    for (const obs of this.config.observability) {
      try {
        action(obs);
      } catch (error) {
        errors.push({
          adapter: obs.constructor?.name || "UnknownObservabilityAdapter",
          error,
        });
      }
    }

    if (errors.length > 0) {
      const errorSummary = errors
        .map(
          ({ adapter, error }) =>
            `  - ${adapter}: ${error instanceof Error ? error.message : String(error)}`
        )
        .join("\n");

      console.error(
        `[couchwire] Observability failure in ${actionName} (${errors.length}/${this.config.observability.length} adapters failed):\n${errorSummary}`
      );
    }
  }

  /**
   * Broadcasts a warning with its metadata sanitized.
   */
  warn(message: string, metadata?: Record<string, unknown>): void {
    const safe = metadata === undefined ? undefined : sanitizeObject(metadata, this.config.sanitizerOptions);
    this.broadcast(
      (obs) => obs.logWarning(message, isJsonObject(safe) ? safe : undefined),
      "logWarning"
    );
  }

  private metric(name: string, value: number, tags: Record<string, string>): void {
    const metric: Metric = { name, value, tags, timestamp: new Date() };
    this.broadcast(
      (obs) => obs.recordMetric(sanitizeMetric(metric, this.config.sanitizerOptions)),
      `recordMetric:${name}`
    );
  }

  buildHeaders(method: HttpMethod, body: RequestBody | undefined, contentType?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": getUserAgent(),
    };
    if (method === "GET" || method === "HEAD") {
      headers["Accept"] = "application/json";
    }
    if (body !== undefined) {
      headers["Content-Type"] = contentType ?? JSON_CONTENT_TYPE;
    }
    if (this.authorization !== undefined) {
      headers["Authorization"] = this.authorization;
    }
    return headers;
  }

  /**
   * Sends one request and returns the unread response.
   *
   * @throws TransportError when the transport fails; the request is aborted first
   */
  async execute(
    method: HttpMethod,
    uri: string,
    body?: RequestBody,
    contentType?: string
  ): Promise<TransportResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const database = this.config.context.database;
    const headers = this.buildHeaders(method, body, contentType);
    const loggedUri = sanitizeUri(uri, this.config.sanitizerOptions);

    const requestContext: RequestContext = {
      database,
      method,
      uri: loggedUri,
      requestId,
      headers: sanitizeRequestHeaders(headers, this.config.sanitizerOptions),
      timestamp: new Date(),
    };
    this.broadcast((obs) => obs.logRequest(requestContext), "logRequest");

    const controller = new AbortController();
    const request: TransportRequest = { method, url: uri, headers, signal: controller.signal };
    if (body !== undefined) {
      request.body = body;
    }
    if (this.config.timeout !== undefined) {
      request.timeout = this.config.timeout;
    }

    let response: TransportResponse;
    try {
      response = await this.config.transport.send(request);
    } catch (error) {
      // Release whatever the transport may still hold for this request.
      controller.abort();
      const transportError =
        error instanceof CouchError && error.category === "transport"
          ? error
          : new TransportError(
              `Error executing ${method} request: ${error instanceof Error ? error.message : String(error)}`,
              method,
              loggedUri,
              { cause: error }
            );
      const duration = Date.now() - startTime;
      const errorContext: ErrorContext = {
        database,
        method,
        uri: loggedUri,
        requestId,
        error: {
          category: transportError.category,
          message: transportError.message,
          name: transportError.name,
        },
        duration,
        timestamp: new Date(),
      };
      this.broadcast((obs) => obs.logError(errorContext), "logError");
      this.metric("couchwire.request.error", 1, { database, method, category: transportError.category });
      throw transportError;
    }

    const duration = Date.now() - startTime;
    const responseContext: ResponseContext = {
      database,
      method,
      uri: loggedUri,
      requestId,
      statusCode: response.status,
      duration,
      timestamp: new Date(),
    };
    this.broadcast((obs) => obs.logResponse(responseContext), "logResponse");
    this.metric("couchwire.request.count", 1, { database, method, status: String(response.status) });
    this.metric("couchwire.request.duration", duration, { database, method });

    return response;
  }
}
