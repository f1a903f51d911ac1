/**
 * Public API surface for couchwire.
 *
 * This is the ONLY file consumers should import from.
 * All other modules are internal implementation details.
 */

// Main client
export { CouchClient } from "./index.js";

// Configuration
export {
  resolveConnectionContext,
  loadConfigFromEnv,
  defaultPort,
  DEFAULT_HTTP_PORT,
  DEFAULT_HTTPS_PORT,
} from "./config.js";
export type {
  ClientConfig,
  ConnectionContext,
  AuthConfig,
  Protocol,
  SanitizerOptions,
} from "./core/types.js";

// Data model
export type {
  Document,
  JsonObject,
  WriteResult,
  QueryParams,
  QueryValue,
  RequestBody,
  Sequence,
  ChangeRow,
  ChangeRevision,
  ChangesResult,
  ChangesQuery,
  ChangesStyle,
} from "./core/types.js";

// Operations
export { DocumentOperations, generateId } from "./documents/operations.js";
export { Changes, ChangeFeed, LAST_SEQ_PREFIX, DEFAULT_IDLE_GRACE_MS } from "./changes/changes.js";
export type { ContinuousChangesOptions } from "./changes/changes.js";

// Errors - frozen contract
export {
  CouchError,
  TransportError,
  DecodeError,
  DocumentNotFoundError,
  DocumentConflictError,
  PreconditionError,
  RequestFailedError,
  FeedError,
  isCouchError,
} from "./core/errors.js";
export type { CouchErrorCategory } from "./core/errors.js";

// Decoding
export {
  ShapeError,
  arrayOf,
  document,
  jsonObject,
  jsonValue,
  writeResult,
  writeResults,
  changeRow,
  changesResult,
} from "./core/shapes.js";
export type { Shape } from "./core/shapes.js";
export { defaultJsonCodec } from "./core/codec.js";
export type { JsonCodec } from "./core/codec.js";
export { UriBuilder } from "./core/uri-builder.js";

// Transport extension point
export { FetchTransport, DEFAULT_TIMEOUT_MS } from "./core/transport.js";
export type { FetchTransportOptions } from "./core/transport.js";
export type {
  Transport,
  TransportRequest,
  TransportResponse,
  HttpMethod,
} from "./core/types.js";

// Observability extension point
export type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "./core/types.js";

// Built-in observability adapters
export { ConsoleObservability } from "./observability/console.js";
export type { ConsoleObservabilityConfig } from "./observability/console.js";
export { NoOpObservability } from "./observability/noop.js";
export { OpenTelemetryObservability } from "./observability/otel.js";
export type {
  OpenTelemetryConfig,
  OTelTracer,
  OTelSpan,
  OTelMeter,
  OTelCounter,
  OTelHistogram,
} from "./observability/otel.js";

export { getClientVersion } from "./core/versioning.js";
