import { describe, it, expect } from "vitest";
import { FetchTransport } from "./transport.js";
import { TransportError } from "./errors.js";
import type { ConnectionContext } from "./types.js";

const context: ConnectionContext = {
  protocol: "http",
  host: "localhost",
  port: 5984,
  database: "orders",
};

interface FetchCall {
  url: string;
  init: RequestInit | undefined;
}

function stubFetch(calls: FetchCall[], response: () => Promise<Response>): typeof fetch {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return response();
  };
}

describe("FetchTransport", () => {
  it("sends method, headers, body and an abort signal", async () => {
    const calls: FetchCall[] = [];
    const transport = new FetchTransport(context, {
      fetch: stubFetch(calls, async () => new Response('{"ok":true}', { status: 201, statusText: "Created" })),
    });

    const response = await transport.send({
      method: "PUT",
      url: "http://localhost:5984/orders/a",
      headers: { "Content-Type": "application/json" },
      body: '{"x":1}',
    });

    expect(response.status).toBe(201);
    expect(response.statusText).toBe("Created");
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("http://localhost:5984/orders/a");
    expect(calls[0]?.init?.method).toBe("PUT");
    expect(calls[0]?.init?.body).toBe('{"x":1}');
    expect(calls[0]?.init?.headers).toEqual({ "Content-Type": "application/json" });
    expect(calls[0]?.init?.signal).toBeInstanceOf(AbortSignal);
    expect(calls[0]?.init?.duplex).toBeUndefined();
  });

  it("refuses URLs outside the bound origin without calling fetch", async () => {
    const calls: FetchCall[] = [];
    const transport = new FetchTransport(context, {
      fetch: stubFetch(calls, async () => new Response(null)),
    });

    await expect(
      transport.send({ method: "GET", url: "http://elsewhere.test:5984/orders", headers: {} })
    ).rejects.toThrow(
      "Refusing to send request to http://elsewhere.test:5984; transport is bound to http://localhost:5984"
    );
    expect(calls).toHaveLength(0);
  });

  it("sends streamed bodies in half-duplex mode", async () => {
    const calls: FetchCall[] = [];
    const transport = new FetchTransport(context, {
      fetch: stubFetch(calls, async () => new Response(null, { status: 201 })),
    });
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield new TextEncoder().encode("abc");
    }

    await transport.send({ method: "PUT", url: "http://localhost:5984/orders/a/file.txt", headers: {}, body: chunks() });

    expect(calls[0]?.init?.duplex).toBe("half");
  });

  it("turns a header timeout into a TransportError naming the timeout", async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(Object.assign(new Error("The operation was aborted"), { name: "AbortError" }));
        });
      });
    const transport = new FetchTransport(context, { timeout: 20, fetch: hanging });

    const failure = transport.send({ method: "GET", url: "http://localhost:5984/orders", headers: {} });

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow("Request timeout after 20ms");
  });

  it("prefers the request's own timeout", async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(Object.assign(new Error("aborted"), { name: "AbortError" }));
        });
      });
    const transport = new FetchTransport(context, { timeout: 60000, fetch: hanging });

    await expect(
      transport.send({ method: "GET", url: "http://localhost:5984/orders", headers: {}, timeout: 10 })
    ).rejects.toThrow("Request timeout after 10ms");
  });

  it("reports a caller abort as a cancellation, not a timeout", async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(Object.assign(new Error("aborted"), { name: "AbortError" }));
        });
      });
    const transport = new FetchTransport(context, { timeout: 60000, fetch: hanging });
    const caller = new AbortController();

    const failure = transport.send({
      method: "GET",
      url: "http://localhost:5984/orders",
      headers: {},
      signal: caller.signal,
    });
    caller.abort();

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toThrow("Request cancelled by caller");
  });

  it("rethrows other fetch failures unchanged", async () => {
    const refused = new Error("connect ECONNREFUSED");
    const transport = new FetchTransport(context, {
      fetch: async () => {
        throw refused;
      },
    });

    await expect(
      transport.send({ method: "GET", url: "http://localhost:5984/orders", headers: {} })
    ).rejects.toBe(refused);
  });

  it("aborts the underlying request when the response is aborted", async () => {
    const calls: FetchCall[] = [];
    const transport = new FetchTransport(context, {
      fetch: stubFetch(calls, async () => new Response("{}")),
    });

    const response = await transport.send({ method: "GET", url: "http://localhost:5984/orders", headers: {} });
    const signal = calls[0]?.init?.signal;
    expect(signal?.aborted).toBe(false);

    response.abort();
    response.abort();

    expect(signal?.aborted).toBe(true);
  });

  it("links the caller's signal to the request", async () => {
    const calls: FetchCall[] = [];
    const transport = new FetchTransport(context, {
      fetch: stubFetch(calls, async () => new Response("{}")),
    });
    const caller = new AbortController();

    await transport.send({
      method: "GET",
      url: "http://localhost:5984/orders",
      headers: {},
      signal: caller.signal,
    });
    caller.abort();

    expect(calls[0]?.init?.signal?.aborted).toBe(true);
  });
});
