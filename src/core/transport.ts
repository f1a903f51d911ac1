/**
 * Default HTTP transport over the runtime's fetch.
 *
 * Connection pooling is the fetch dispatcher's job; this class only binds
 * the origin once and gives every request its own AbortController so a
 * failed or abandoned request can release its connection.
 */

import type {
  ConnectionContext,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./types.js";
import { TransportError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 30000;

export interface FetchTransportOptions {
  /** Header timeout applied when a request does not set its own */
  timeout?: number;
  /** Defaults to globalThis.fetch */
  fetch?: typeof fetch;
}

export class FetchTransport implements Transport {
  private readonly origin: string;
  private readonly timeout: number;
  private readonly fetchImpl: typeof fetch;

  constructor(context: ConnectionContext, options: FetchTransportOptions = {}) {
    this.origin = new URL(`${context.protocol}://${context.host}:${context.port}`).origin;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const url = new URL(request.url, this.origin);
    if (url.origin !== this.origin) {
      throw new TransportError(
        `Refusing to send request to ${url.origin}; transport is bound to ${this.origin}`,
        request.method,
        request.url
      );
    }

    const timeout = request.timeout ?? this.timeout;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onCallerAbort = () => controller.abort();
    if (request.signal) {
      if (request.signal.aborted) {
        controller.abort();
      } else {
        request.signal.addEventListener("abort", onCallerAbort, { once: true });
      }
    }

    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      signal: controller.signal,
    };
    if (request.body !== undefined) {
      init.body = request.body;
      if (typeof request.body !== "string" && !(request.body instanceof Uint8Array)) {
        // Streamed bodies need half-duplex mode.
        init.duplex = "half";
      }
    }

    try {
      const fetchImpl = this.fetchImpl;
      const response = await fetchImpl(url, init);
      return {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body: response.body,
        abort: () => {
          request.signal?.removeEventListener("abort", onCallerAbort);
          controller.abort();
        },
      };
    } catch (error) {
      request.signal?.removeEventListener("abort", onCallerAbort);
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportError(
          timedOut ? `Request timeout after ${timeout}ms` : "Request cancelled by caller",
          request.method,
          request.url,
          { cause: error }
        );
      }
      throw error;
    } finally {
      // Bounds only the wait for headers; feed bodies stay open.
      clearTimeout(timeoutId);
    }
  }
}
