import { describe, it, expect } from "vitest";
import { CouchClient } from "../index.js";
import { FeedError, RequestFailedError } from "../core/errors.js";
import type { ChangeRow } from "../core/types.js";
import { defaultJsonCodec, type JsonCodec } from "../core/codec.js";
import { ControlledStream, FakeTransport } from "../testing/fake-transport.js";
import { RecordingObservability } from "../testing/recording-observability.js";
import type { ChangeFeed, ContinuousChangesOptions } from "./changes.js";

function row(seq: number, id: string): string {
  return `${JSON.stringify({ seq, id, changes: [{ rev: `${seq}-x` }] })}\n`;
}

function setup() {
  const transport = new FakeTransport();
  const recorder = new RecordingObservability();
  const client = new CouchClient({
    host: "localhost",
    database: "orders",
    transport,
    observability: recorder,
  });
  return { transport, recorder, client };
}

async function openFeed(source: ControlledStream, options: ContinuousChangesOptions = {}) {
  const context = setup();
  context.transport.enqueue({ body: source.stream });
  const feed = await context.client.changes().continuousChanges(options);
  return { ...context, feed };
}

async function drain(feed: ChangeFeed): Promise<ChangeRow[]> {
  const rows: ChangeRow[] = [];
  while (await feed.hasNext()) {
    rows.push(feed.next());
  }
  return rows;
}

describe("Changes builder", () => {
  it("puts every parameter on the feed URI", () => {
    const { client } = setup();

    const uri = client
      .changes()
      .since("now")
      .limit(5)
      .heartbeat(1000)
      .timeout(60000)
      .filter("app/important")
      .includeDocs(true)
      .style("all_docs")
      .buildUri("continuous");

    expect(uri).toBe(
      "http://localhost:5984/orders/_changes?feed=continuous&since=now&limit=5&heartbeat=1000&timeout=60000&filter=app%2Fimportant&include_docs=true&style=all_docs"
    );
  });

  it("decodes the normal feed", async () => {
    const { transport, client } = setup();
    transport.enqueue({
      body: '{"results":[{"seq":3,"id":"a","changes":[{"rev":"2-y"}],"deleted":true}],"last_seq":3,"pending":0}',
    });

    const result = await client.changes().since(2).getChanges();

    expect(result).toEqual({
      results: [{ seq: 3, id: "a", changes: [{ rev: "2-y" }], deleted: true }],
      last_seq: 3,
      pending: 0,
    });
    expect(transport.lastRequest?.url).toBe("http://localhost:5984/orders/_changes?feed=normal&since=2");
  });

  it("copies parameters when a feed is opened", async () => {
    const { transport, client } = setup();
    const source = new ControlledStream();
    transport.enqueue({ body: source.stream });
    const changes = client.changes().since(1);

    const feed = await changes.continuousChanges();
    changes.since(5);

    expect(transport.lastRequest?.url).toBe("http://localhost:5984/orders/_changes?feed=continuous&since=1");
    expect(changes.params()).toEqual({ since: 5 });
    await feed.close();
  });

  it("fails to open on an error status", async () => {
    const { transport, client } = setup();
    transport.enqueue({ status: 400, body: '{"error":"bad_request","reason":"invalid since"}' });

    await expect(client.changes().since("junk").continuousChanges()).rejects.toBeInstanceOf(RequestFailedError);
    expect(transport.abortCount).toBe(1);
  });
});

describe("ChangeFeed", () => {
  it("yields rows in order, skips heartbeats and ends at last_seq", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    source.push("\n");
    source.push(row(2, "b"));
    source.push('{"last_seq":2}\n');
    source.push(row(3, "never"));
    const { feed, transport } = await openFeed(source);

    const rows = await drain(feed);

    expect(rows.map((r) => [r.seq, r.id])).toEqual([
      [1, "a"],
      [2, "b"],
    ]);
    expect(feed.stopped).toBe(true);
    expect(source.cancelled).toBe(true);
    expect(transport.abortCount).toBe(1);
    await expect(feed.hasNext()).resolves.toBe(false);
    expect(transport.abortCount).toBe(1);
  });

  it("ends when the stream ends", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    source.end();
    const { feed, transport } = await openFeed(source);

    const ids: string[] = [];
    for await (const change of feed) {
      ids.push(change.id);
    }

    expect(ids).toEqual(["a"]);
    expect(feed.stopped).toBe(true);
    expect(transport.abortCount).toBe(1);
  });

  it("keeps a buffered row across repeated hasNext calls", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    source.push(row(2, "b"));
    const { feed } = await openFeed(source);

    expect(await feed.hasNext()).toBe(true);
    expect(await feed.hasNext()).toBe(true);
    expect(feed.next().id).toBe("a");
    expect(await feed.hasNext()).toBe(true);
    expect(feed.next().id).toBe("b");
    await feed.close();
  });

  it("stops at the next pull after stop()", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    source.push(row(2, "b"));
    const { feed, transport } = await openFeed(source);

    expect(await feed.hasNext()).toBe(true);
    expect(feed.next().id).toBe("a");
    feed.stop();

    expect(await feed.hasNext()).toBe(false);
    expect(feed.stopped).toBe(true);
    expect(source.cancelled).toBe(true);
    expect(transport.abortCount).toBe(1);
  });

  it("stops when the caller's signal aborts", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    const controller = new AbortController();
    const { feed, transport } = await openFeed(source, { signal: controller.signal });

    controller.abort();

    expect(await feed.hasNext()).toBe(false);
    expect(transport.abortCount).toBe(1);
  });

  it("throws from next() without a buffered row and stays open", async () => {
    const source = new ControlledStream();
    const { feed, transport } = await openFeed(source);

    expect(() => feed.next()).toThrow(new FeedError("No change row available; await hasNext() first"));
    expect(feed.stopped).toBe(false);
    expect(transport.abortCount).toBe(0);
    await feed.close();
  });

  it("stops before raising a parse failure", async () => {
    const source = new ControlledStream();
    source.push("not json\n");
    const { feed, transport, recorder } = await openFeed(source);

    const failure = feed.hasNext();

    await expect(failure).rejects.toBeInstanceOf(FeedError);
    await expect(failure).rejects.toThrow(/^Error parsing continuous changes row: Malformed JSON in response body: /);
    expect(feed.stopped).toBe(true);
    expect(transport.abortCount).toBe(1);
    expect(recorder.warnings).toHaveLength(1);
    expect(recorder.warnings[0]?.metadata).toEqual({ component: "ChangeFeed" });
  });

  it("stops before raising a read failure", async () => {
    const source = new ControlledStream();
    const reset = new Error("connection reset");
    source.fail(reset);
    const { feed, transport } = await openFeed(source);

    const failure = feed.hasNext();

    await expect(failure).rejects.toThrow(new FeedError("Error reading continuous changes stream: connection reset"));
    await expect(failure).rejects.toMatchObject({ cause: reset });
    expect(feed.stopped).toBe(true);
    expect(transport.abortCount).toBe(1);
  });

  it("bounds each read by heartbeat plus the idle grace", async () => {
    const source = new ControlledStream();
    const { transport, client } = setup();
    transport.enqueue({ body: source.stream });
    const feed = await client.changes().heartbeat(10).continuousChanges({ idleGraceMs: 20 });

    await expect(feed.hasNext()).rejects.toThrow(
      new FeedError("Error reading continuous changes stream: No data received within 30ms")
    );
    expect(feed.stopped).toBe(true);
    expect(source.cancelled).toBe(true);
  });

  it("releases once when a for-await loop breaks early", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    source.push(row(2, "b"));
    const { feed, transport } = await openFeed(source);

    for await (const change of feed) {
      expect(change.id).toBe("a");
      break;
    }
    await feed.close();

    expect(feed.stopped).toBe(true);
    expect(source.cancelled).toBe(true);
    expect(transport.abortCount).toBe(1);
  });

  it("stops cleanly when the stream errors between pulls", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    const { feed, transport } = await openFeed(source);

    expect(await feed.hasNext()).toBe(true);
    expect(feed.next().id).toBe("a");
    source.fail(new Error("connection reset"));
    feed.stop();

    expect(await feed.hasNext()).toBe(false);
    await expect(feed.close()).resolves.toBeUndefined();
    await expect(feed.close()).resolves.toBeUndefined();
    expect(feed.stopped).toBe(true);
    expect(transport.abortCount).toBe(1);
  });

  it("releases once however often it is stopped and closed", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    const { feed, transport } = await openFeed(source);

    feed.stop();
    feed.stop();
    expect(await feed.hasNext()).toBe(false);
    await feed.close();
    await feed.close();

    expect(source.cancelCount).toBe(1);
    expect(transport.abortCount).toBe(1);
  });

  it("does not release again when stopped after the stream ended", async () => {
    const source = new ControlledStream();
    source.push(row(1, "a"));
    source.end();
    const { feed, transport } = await openFeed(source);

    expect((await drain(feed)).map((r) => r.id)).toEqual(["a"]);
    feed.stop();
    expect(await feed.hasNext()).toBe(false);
    await feed.close();

    // The server closed the body, so the reader never cancels it.
    expect(source.cancelCount).toBe(0);
    expect(transport.abortCount).toBe(1);
  });

  it("ends at a last_seq line with a string sequence without decoding it", async () => {
    const decoded: string[] = [];
    const codec: JsonCodec = {
      encode: (value) => defaultJsonCodec.encode(value),
      decode: (text) => {
        decoded.push(text);
        return defaultJsonCodec.decode(text);
      },
    };
    const transport = new FakeTransport();
    const client = new CouchClient({
      host: "localhost",
      database: "orders",
      transport,
      codec,
      observability: new RecordingObservability(),
    });
    const source = new ControlledStream();
    source.push('{"last_seq":"123"}\n');
    transport.enqueue({ body: source.stream });
    const feed = await client.changes().continuousChanges();

    expect(await feed.hasNext()).toBe(false);
    expect(decoded).toEqual([]);
    expect(feed.stopped).toBe(true);
    expect(source.cancelCount).toBe(1);
  });
});
