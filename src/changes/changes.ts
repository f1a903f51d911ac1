/**
 * Change feed access: the `Changes` query builder and the `ChangeFeed`
 * session over a continuous feed.
 *
 * ChangeFeed states: Streaming → (Yielding ⇄ Streaming) → Stopped
 *
 * INVARIANTS:
 * - Stopped is terminal; entering it closes the line reader and aborts the
 *   held request exactly once, whichever path gets there first
 * - stop() is cooperative: it is observed at the next pull, never in the
 *   middle of a read
 * - a read or parse failure stops the feed before the FeedError surfaces
 */

import type {
  ChangeRow,
  ChangesQuery,
  ChangesResult,
  ChangesStyle,
  Sequence,
  TransportResponse,
} from "../core/types.js";
import type { RequestExecutor } from "../core/executor.js";
import type { ResponseInterpreter } from "../core/interpreter.js";
import type { UriBuilder } from "../core/uri-builder.js";
import { FeedError } from "../core/errors.js";
import { changeRow, changesResult } from "../core/shapes.js";
import { LineReader } from "./line-reader.js";

/** Terminal summary record of a continuous feed; matched textually */
export const LAST_SEQ_PREFIX = '{"last_seq":';

export const DEFAULT_IDLE_GRACE_MS = 5000;

export interface ContinuousChangesOptions {
  /** Aborting acts like stop(): observed at the next pull */
  signal?: AbortSignal;
  /**
   * Added to max(heartbeat, timeout) to bound each read. Only used when
   * heartbeat or timeout is set.
   */
  idleGraceMs?: number;
}

export interface ChangesDependencies {
  executor: RequestExecutor;
  interpreter: ResponseInterpreter;
  /** Builder positioned at the database URI */
  databaseUri: () => UriBuilder;
}

export interface ChangeFeedConfig {
  /** The open continuous-feed response; its body is owned by `reader` */
  response: TransportResponse;
  reader: LineReader;
  decodeRow: (line: string) => ChangeRow;
  /** Upper bound for each read, in ms; unbounded when undefined */
  readBoundMs: number | undefined;
  warn: (message: string, metadata?: Record<string, unknown>) => void;
  signal?: AbortSignal;
}

type FeedState = "streaming" | "stopped";

export class ChangeFeed implements AsyncIterable<ChangeRow> {
  private config: ChangeFeedConfig;
  private state: FeedState = "streaming";
  private readonly stopToken = new AbortController();
  private nextRow: ChangeRow | null = null;
  private termination: Promise<void> | null = null;

  constructor(config: ChangeFeedConfig) {
    this.config = config;
  }

  get stopped(): boolean {
    return this.state === "stopped";
  }

  /**
   * Requests the feed to stop. Takes effect at the next pull; a read already
   * in progress is not interrupted.
   */
  stop(): void {
    this.stopToken.abort();
  }

  /**
   * Stops the feed and releases its connection now.
   */
  async close(): Promise<void> {
    this.stop();
    await this.terminate();
  }

  /**
   * Pulls the next row. Resolves false once the feed has ended, been
   * stopped, or delivered its last_seq summary.
   *
   * @throws FeedError on read or parse failure; the feed is stopped first
   */
  async hasNext(): Promise<boolean> {
    if (this.state === "stopped") {
      return false;
    }
    if (this.stopRequested()) {
      await this.terminate();
      return false;
    }
    if (this.nextRow !== null) {
      return true;
    }

    let line: string | null;
    try {
      do {
        line = await this.config.reader.readLine(this.config.readBoundMs);
      } while (line !== null && line.trim().length === 0);
    } catch (error) {
      throw await this.fail("Error reading continuous changes stream", error);
    }

    if (line === null || line.startsWith(LAST_SEQ_PREFIX)) {
      await this.terminate();
      return false;
    }

    try {
      this.nextRow = this.config.decodeRow(line);
    } catch (error) {
      throw await this.fail("Error parsing continuous changes row", error);
    }
    return true;
  }

  /**
   * Returns the row buffered by the last successful hasNext().
   */
  next(): ChangeRow {
    const row = this.nextRow;
    if (row === null) {
      throw new FeedError("No change row available; await hasNext() first");
    }
    this.nextRow = null;
    return row;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ChangeRow, void, undefined> {
    try {
      while (await this.hasNext()) {
        yield this.next();
      }
    } finally {
      await this.close();
    }
  }

  private stopRequested(): boolean {
    return this.stopToken.signal.aborted || this.config.signal?.aborted === true;
  }

  /**
   * Stops the feed and returns the error to raise.
   */
  private async fail(message: string, cause: unknown): Promise<FeedError> {
    const detail = cause instanceof Error ? cause.message : String(cause);
    this.config.warn(`${message}: ${detail}`, { component: "ChangeFeed" });
    await this.terminate();
    return new FeedError(`${message}: ${detail}`, { cause });
  }

  private terminate(): Promise<void> {
    if (this.termination === null) {
      this.state = "stopped";
      this.nextRow = null;
      this.termination = this.release();
    }
    return this.termination;
  }

  private async release(): Promise<void> {
    try {
      await this.config.reader.close();
    } finally {
      this.config.response.abort();
    }
  }
}

/**
 * Builder for change feed requests. Parameters are copied into the request
 * when a feed is opened; later changes only affect feeds opened afterwards.
 */
export class Changes {
  private readonly deps: ChangesDependencies;
  private query: ChangesQuery = {};

  constructor(deps: ChangesDependencies) {
    this.deps = deps;
  }

  since(since: Sequence): this {
    this.query = { ...this.query, since };
    return this;
  }

  limit(limit: number): this {
    this.query = { ...this.query, limit };
    return this;
  }

  heartbeat(heartbeat: number): this {
    this.query = { ...this.query, heartbeat };
    return this;
  }

  timeout(timeout: number): this {
    this.query = { ...this.query, timeout };
    return this;
  }

  filter(filter: string): this {
    this.query = { ...this.query, filter };
    return this;
  }

  includeDocs(includeDocs: boolean): this {
    this.query = { ...this.query, includeDocs };
    return this;
  }

  style(style: ChangesStyle): this {
    this.query = { ...this.query, style };
    return this;
  }

  /**
   * Current parameters, as they would be sent.
   */
  params(): Readonly<ChangesQuery> {
    return { ...this.query };
  }

  buildUri(feed: "normal" | "continuous"): string {
    const q = this.query;
    return this.deps
      .databaseUri()
      .pathSegment("_changes")
      .query("feed", feed)
      .query("since", q.since)
      .query("limit", q.limit)
      .query("heartbeat", q.heartbeat)
      .query("timeout", q.timeout)
      .query("filter", q.filter)
      .query("include_docs", q.includeDocs)
      .query("style", q.style)
      .build();
  }

  /**
   * One-shot (normal) feed.
   */
  async getChanges(): Promise<ChangesResult> {
    const response = await this.deps.executor.execute("GET", this.buildUri("normal"));
    return this.deps.interpreter.decodeAs(response, changesResult);
  }

  /**
   * Opens a continuous feed. The response body is read line by line as the
   * caller pulls rows.
   */
  async continuousChanges(options: ContinuousChangesOptions = {}): Promise<ChangeFeed> {
    const { executor, interpreter } = this.deps;
    const q = this.query;
    const response = await executor.execute("GET", this.buildUri("continuous"));
    const stream = await interpreter.asStream(response);

    let readBoundMs: number | undefined;
    if (q.heartbeat !== undefined || q.timeout !== undefined) {
      readBoundMs =
        Math.max(q.heartbeat ?? 0, q.timeout ?? 0) + (options.idleGraceMs ?? DEFAULT_IDLE_GRACE_MS);
    }

    const config: ChangeFeedConfig = {
      response,
      reader: new LineReader(stream),
      decodeRow: (line) => interpreter.decodeText(line, changeRow),
      readBoundMs,
      warn: (message, metadata) => executor.warn(message, metadata),
    };
    if (options.signal) {
      config.signal = options.signal;
    }
    return new ChangeFeed(config);
  }
}
