/**
 * couchwire - Main entry point
 */

import type {
  ClientConfig,
  ConnectionContext,
  ObservabilityAdapter,
  Transport,
} from "./core/types.js";
import type { JsonCodec } from "./core/codec.js";
import { defaultJsonCodec } from "./core/codec.js";
import { RequestExecutor } from "./core/executor.js";
import { ResponseInterpreter } from "./core/interpreter.js";
import { FetchTransport } from "./core/transport.js";
import { UriBuilder } from "./core/uri-builder.js";
import { DocumentOperations } from "./documents/operations.js";
import { Changes } from "./changes/changes.js";
import { ConsoleObservability } from "./observability/console.js";
import { resolveConnectionContext } from "./config.js";

interface ResolvedUris {
  base: UriBuilder;
  database: UriBuilder;
}

export class CouchClient {
  readonly context: ConnectionContext;
  readonly transport: Transport;
  readonly codec: JsonCodec;
  readonly documents: DocumentOperations;
  private readonly observability: readonly ObservabilityAdapter[];
  private readonly executor: RequestExecutor;
  private readonly interpreter: ResponseInterpreter;
  private uris: ResolvedUris | null = null;
  private closed = false;

  constructor(config: ClientConfig) {
    this.context = resolveConnectionContext(config);
    this.codec = config.codec ?? defaultJsonCodec;

    const transportOptions: { timeout?: number } = {};
    if (config.timeout !== undefined) {
      transportOptions.timeout = config.timeout;
    }
    this.transport = config.transport ?? new FetchTransport(this.context, transportOptions);

    if (Array.isArray(config.observability)) {
      this.observability = Object.freeze([...config.observability]);
    } else if (config.observability) {
      this.observability = Object.freeze([config.observability]);
    } else {
      this.observability = Object.freeze([new ConsoleObservability()]);
    }

    this.executor = new RequestExecutor({
      context: this.context,
      transport: this.transport,
      observability: [...this.observability],
      ...(config.timeout !== undefined ? { timeout: config.timeout } : {}),
      ...(config.observabilitySanitizer
        ? { sanitizerOptions: config.observabilitySanitizer }
        : {}),
    });
    this.interpreter = new ResponseInterpreter(this.codec);
    this.documents = new DocumentOperations({
      executor: this.executor,
      interpreter: this.interpreter,
      codec: this.codec,
      databaseUri: () => this.databaseUriBuilder(),
    });
  }

  /**
   * `protocol://host:port[/path]/`
   */
  get baseUri(): string {
    return `${this.resolveUris().base.build().replace(/\/$/, "")}/`;
  }

  /**
   * `protocol://host:port[/path]/{database}/`
   */
  get databaseUri(): string {
    return `${this.resolveUris().database.build()}/`;
  }

  /**
   * Builder positioned at the database, for URIs passed to findAny.
   */
  databaseUriBuilder(): UriBuilder {
    return this.resolveUris().database;
  }

  /**
   * A fresh change feed builder for this database.
   */
  changes(): Changes {
    return new Changes({
      executor: this.executor,
      interpreter: this.interpreter,
      databaseUri: () => this.databaseUriBuilder(),
    });
  }

  /**
   * Releases the transport's pooled connections. Only the first call has
   * any effect.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.transport.close?.();
  }

  private resolveUris(): ResolvedUris {
    if (this.uris === null) {
      const { protocol, host, port, path, database } = this.context;
      const base = UriBuilder.from(protocol, host, port).path(path ?? "");
      this.uris = { base, database: base.pathSegment(database) };
    }
    return this.uris;
  }
}
