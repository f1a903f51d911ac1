/**
 * Core type definitions for the couchwire client
 */

import type { CouchErrorCategory } from "./errors.js";
import type { JsonCodec } from "./codec.js";

// ============================================================================
// Connection
// ============================================================================

export type Protocol = "http" | "https";

export type AuthConfig =
  | { username: string; password: string }
  | { token: string };

/**
 * Immutable connection settings, resolved once per client.
 * See resolveConnectionContext in ../config.ts.
 */
export interface ConnectionContext {
  readonly protocol: Protocol;
  readonly host: string;
  readonly port: number;
  /** Optional path prefix in front of every database (reverse proxies) */
  readonly path?: string;
  readonly database: string;
  readonly auth?: Readonly<AuthConfig>;
}

// ============================================================================
// Transport
// ============================================================================

export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "DELETE";

export type RequestBody = string | Uint8Array | AsyncIterable<Uint8Array>;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: RequestBody;
  /** Milliseconds to wait for response headers */
  timeout?: number;
  /** Aborting it cancels the request and releases its connection */
  signal?: AbortSignal;
}

/**
 * A response whose body has not been read yet.
 *
 * The holder MUST either consume `body` or call `abort()`; an unread body
 * pins a pooled connection.
 */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: ReadableStream<Uint8Array> | null;
  abort(): void;
}

/**
 * HTTP capability injected into the client.
 *
 * Implementations own connection pooling and bind scheme/host/port once,
 * at construction.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close?(): Promise<void>;
}

// ============================================================================
// Documents
// ============================================================================

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | undefined>;

export interface JsonObject {
  [key: string]: unknown;
}

/**
 * A stored document as returned by the server.
 */
export interface Document extends JsonObject {
  _id: string;
  _rev: string;
}

/**
 * Result of a write. Single-document writes only resolve with `ok: true`;
 * bulk writes report failures per entry.
 */
export interface WriteResult {
  id: string;
  rev?: string;
  ok: boolean;
  error?: string;
  reason?: string;
}

// ============================================================================
// Change feed
// ============================================================================

export type Sequence = string | number;

export interface ChangeRevision {
  rev: string;
}

export interface ChangeRow {
  seq: Sequence;
  id: string;
  changes: ChangeRevision[];
  deleted?: boolean;
  doc?: JsonObject;
}

export interface ChangesResult {
  results: ChangeRow[];
  last_seq: Sequence;
  pending?: number;
}

export type ChangesStyle = "main_only" | "all_docs";

export interface ChangesQuery {
  since?: Sequence;
  limit?: number;
  /** Keep-alive newline interval requested from the server, in ms */
  heartbeat?: number;
  /** Server-side feed timeout, in ms */
  timeout?: number;
  /** Filter function reference, "ddoc/filter" */
  filter?: string;
  includeDocs?: boolean;
  style?: ChangesStyle;
}

// ============================================================================
// Observability
// ============================================================================

export interface RequestContext {
  database: string;
  method: HttpMethod;
  uri: string;
  requestId: string;
  headers: Record<string, string>;
  timestamp: Date;
}

export interface ResponseContext {
  database: string;
  method: HttpMethod;
  uri: string;
  requestId: string;
  statusCode: number;
  duration: number;
  timestamp: Date;
}

export interface ErrorContext {
  database: string;
  method: HttpMethod;
  uri: string;
  requestId: string;
  error: {
    category: CouchErrorCategory;
    message: string;
    name: string;
  };
  duration: number;
  timestamp: Date;
}

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: Date;
}

export interface ObservabilityAdapter {
  logRequest(context: RequestContext): void;
  logResponse(context: ResponseContext): void;
  logError(context: ErrorContext): void;
  logWarning(message: string, metadata?: Record<string, unknown>): void;
  recordMetric(metric: Metric): void;
}

export interface SanitizerOptions {
  redactedKeys?: string[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface ClientConfig {
  /** Defaults to "http" */
  protocol?: Protocol;
  host: string;
  /** Defaults to 5984 (http) or 6984 (https) */
  port?: number;
  path?: string;
  database: string;
  auth?: AuthConfig;
  /** Header timeout per request in ms (default: 30000) */
  timeout?: number;
  transport?: Transport;
  codec?: JsonCodec;
  observability?: ObservabilityAdapter | ObservabilityAdapter[];
  observabilitySanitizer?: SanitizerOptions;
}

// ============================================================================
// Versioning
// ============================================================================

export const CLIENT_VERSION = "1.0.0";
