/**
 * Error taxonomy for couchwire.
 *
 * INVARIANTS:
 * - Every error thrown by the client is a CouchError
 * - category is always one of the canonical categories
 * - the client never retries; callers decide what to do with each category
 */

export type CouchErrorCategory =
  | "transport"    // Connection/I-O failure, fatal to the call
  | "decode"       // Malformed or unexpected response body
  | "not_found"    // 404
  | "conflict"     // 409, stale revision
  | "precondition" // Caller broke the id/revision rules, nothing was sent
  | "request"      // Any other non-2xx status
  | "feed";        // Change feed read/parse failure

export class CouchError extends Error {
  readonly category: CouchErrorCategory;

  constructor(message: string, category: CouchErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CouchError";
    this.category = category;
  }
}

export class TransportError extends CouchError {
  readonly method: string;
  readonly uri: string;

  constructor(message: string, method: string, uri: string, options?: { cause?: unknown }) {
    super(message, "transport", options);
    this.name = "TransportError";
    this.method = method;
    this.uri = uri;
  }
}

export class DecodeError extends CouchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "decode", options);
    this.name = "DecodeError";
  }
}

export class DocumentNotFoundError extends CouchError {
  readonly reason: string;

  constructor(reason: string) {
    super(`Document not found: ${reason}`, "not_found");
    this.name = "DocumentNotFoundError";
    this.reason = reason;
  }
}

/**
 * The supplied revision is not the current one. Re-read the document and
 * retry at the application level.
 */
export class DocumentConflictError extends CouchError {
  readonly reason: string;

  constructor(reason: string) {
    super(`Document update conflict: ${reason}`, "conflict");
    this.name = "DocumentConflictError";
    this.reason = reason;
  }
}

export class PreconditionError extends CouchError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Generic failure: any status other than 200/201/202/404/409.
 */
export class RequestFailedError extends CouchError {
  readonly status: number;
  readonly reason: string;
  /** Full response body text */
  readonly body: string;

  constructor(status: number, reason: string, body: string) {
    super(`Request failed with ${status} ${reason}: ${body}`, "request");
    this.name = "RequestFailedError";
    this.status = status;
    this.reason = reason;
    this.body = body;
  }
}

export class FeedError extends CouchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "feed", options);
    this.name = "FeedError";
  }
}

export function isCouchError(error: unknown): error is CouchError {
  return error instanceof CouchError;
}
