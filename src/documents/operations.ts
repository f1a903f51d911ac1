/**
 * Document operations: CRUD, bulk writes, queries and attachments.
 *
 * Every operation is exactly one request, never retried. Argument checks
 * (id/revision rules) run before anything is sent and fail with
 * PreconditionError.
 */

import type {
  Document,
  JsonObject,
  QueryParams,
  RequestBody,
  WriteResult,
} from "../core/types.js";
import type { RequestExecutor } from "../core/executor.js";
import type { ResponseInterpreter } from "../core/interpreter.js";
import type { UriBuilder } from "../core/uri-builder.js";
import type { JsonCodec } from "../core/codec.js";
import { DocumentNotFoundError, PreconditionError } from "../core/errors.js";
import {
  ShapeError,
  arrayOf,
  document,
  isJsonObject,
  jsonValue,
  writeResult,
  writeResults,
  type Shape,
} from "../core/shapes.js";
import { randomUUID } from "crypto";

export interface DocumentOperationsDependencies {
  executor: RequestExecutor;
  interpreter: ResponseInterpreter;
  codec: JsonCodec;
  /** Builder positioned at the database URI */
  databaseUri: () => UriBuilder;
}

/**
 * Client-generated document id: a random UUID without dashes.
 */
export function generateId(): string {
  return randomUUID().replace(/-/g, "");
}

const PREFIXED_ID = /^(_design|_local)\/(.+)$/;

function assertNotEmpty(value: string | undefined, name: string): asserts value is string {
  if (value === undefined || value.length === 0) {
    throw new PreconditionError(`${name} may not be empty`);
  }
}

/**
 * Reads an optional string member of the encoded body.
 */
function stringMember(tree: JsonObject, key: "_id" | "_rev"): string | undefined {
  const value = tree[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new PreconditionError(`${key} must be a string`);
  }
  return value;
}

/**
 * Wraps an item shape for the `{ "docs": [...] }` envelope of a _find response.
 */
function docsEnvelope<T>(item: Shape<T>): Shape<T[]> {
  return (value, path = "$") => {
    if (!isJsonObject(value)) {
      throw new ShapeError(path, "object", value);
    }
    return arrayOf(item)(value["docs"], `${path}.docs`);
  };
}

export class DocumentOperations {
  private readonly deps: DocumentOperationsDependencies;

  constructor(deps: DocumentOperationsDependencies) {
    this.deps = deps;
  }

  /**
   * Builder at the document's URI. `_design/` and `_local/` ids keep their slash.
   */
  documentUri(id: string): UriBuilder {
    const base = this.deps.databaseUri();
    const prefixed = PREFIXED_ID.exec(id);
    if (prefixed?.[1] !== undefined && prefixed[2] !== undefined) {
      return base.pathSegment(prefixed[1]).pathSegment(prefixed[2]);
    }
    return base.pathSegment(id);
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * GET and decode.
   *
   * @throws DocumentNotFoundError on 404
   */
  async get<T>(uri: string, shape: Shape<T>): Promise<T> {
    const response = await this.deps.executor.execute("GET", uri);
    return this.deps.interpreter.decodeAs(response, shape);
  }

  find(id: string, params?: QueryParams): Promise<Document>;
  find<T>(id: string, params: QueryParams | undefined, shape: Shape<T>): Promise<T>;
  async find<T>(id: string, params?: QueryParams, shape?: Shape<T>): Promise<T | Document> {
    assertNotEmpty(id, "id");
    const uri = this.documentUri(id).queryParams(params).build();
    if (shape) {
      return this.get(uri, shape);
    }
    return this.get(uri, document);
  }

  findRevision(id: string, rev: string): Promise<Document>;
  findRevision<T>(id: string, rev: string, shape: Shape<T>): Promise<T>;
  async findRevision<T>(id: string, rev: string, shape?: Shape<T>): Promise<T | Document> {
    assertNotEmpty(id, "id");
    assertNotEmpty(rev, "rev");
    const uri = this.documentUri(id).query("rev", rev).build();
    if (shape) {
      return this.get(uri, shape);
    }
    return this.get(uri, document);
  }

  /**
   * GET any absolute URI on the bound server, e.g. a view or _all_docs.
   */
  findAny(uri: string): Promise<unknown>;
  findAny<T>(uri: string, shape: Shape<T>): Promise<T>;
  async findAny<T>(uri: string, shape?: Shape<T>): Promise<T | unknown> {
    assertNotEmpty(uri, "uri");
    if (shape) {
      return this.get(uri, shape);
    }
    return this.get(uri, jsonValue);
  }

  /**
   * The document body as an unbuffered byte stream. The caller must consume
   * or cancel the stream.
   */
  async findStream(id: string, rev?: string): Promise<ReadableStream<Uint8Array>> {
    assertNotEmpty(id, "id");
    const uri = this.documentUri(id).query("rev", rev).build();
    const response = await this.deps.executor.execute("GET", uri);
    return this.deps.interpreter.asStream(response);
  }

  /**
   * Runs a Mango query and decodes each entry of `docs`. One malformed
   * entry fails the whole call.
   */
  findDocs(query: string | JsonObject): Promise<JsonObject[]>;
  findDocs<T>(query: string | JsonObject, shape: Shape<T>): Promise<T[]>;
  async findDocs<T>(query: string | JsonObject, shape?: Shape<T>): Promise<Array<T | JsonObject>> {
    const body = typeof query === "string" ? query : this.deps.codec.encode(query);
    assertNotEmpty(body, "query");
    const uri = this.deps.databaseUri().pathSegment("_find").build();
    const response = await this.deps.executor.execute("POST", uri, body);
    if (shape) {
      return this.deps.interpreter.decodeAs(response, docsEnvelope(shape));
    }
    return this.deps.interpreter.decodeAs(
      response,
      docsEnvelope((value, path = "$") => {
        if (!isJsonObject(value)) {
          throw new ShapeError(path, "object", value);
        }
        return value;
      })
    );
  }

  /**
   * Existence probe via HEAD. A 404 is the only error turned into a value.
   */
  async contains(id: string): Promise<boolean> {
    assertNotEmpty(id, "id");
    const response = await this.deps.executor.execute("HEAD", this.documentUri(id).build());
    try {
      await this.deps.interpreter.discard(response);
    } catch (error) {
      if (error instanceof DocumentNotFoundError) {
        return false;
      }
      throw error;
    }
    return true;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Creates a document. Fails without a request when `_rev` is present;
   * an absent `_id` is generated client-side.
   */
  save(doc: object): Promise<WriteResult> {
    return this.put(doc, true);
  }

  /**
   * Updates a document. `_id` and `_rev` are both required.
   */
  update(doc: object): Promise<WriteResult> {
    return this.put(doc, false);
  }

  async put(doc: object, isCreate: boolean): Promise<WriteResult> {
    const tree = this.encodeTree(doc);
    let id = stringMember(tree, "_id");
    const rev = stringMember(tree, "_rev");
    if (isCreate) {
      if (rev !== undefined) {
        throw new PreconditionError("rev must be absent when creating a document");
      }
      if (id === undefined || id.length === 0) {
        id = generateId();
        tree["_id"] = id;
      }
    } else {
      assertNotEmpty(id, "id");
      assertNotEmpty(rev, "rev");
    }
    const uri = this.documentUri(id).build();
    const response = await this.deps.executor.execute("PUT", uri, this.deps.codec.encode(tree));
    return this.deps.interpreter.decodeAs(response, writeResult);
  }

  /**
   * Creates a document with a server-assigned id.
   */
  async post(doc: object): Promise<WriteResult> {
    const tree = this.encodeTree(doc);
    const uri = this.deps.databaseUri().build();
    const response = await this.deps.executor.execute("POST", uri, this.deps.codec.encode(tree));
    return this.deps.interpreter.decodeAs(response, writeResult);
  }

  /**
   * Batch-mode create (`batch=ok`): the server acknowledges before the
   * write is durable, so there is no result to return.
   */
  async batch(doc: object): Promise<void> {
    const tree = this.encodeTree(doc);
    const uri = this.deps.databaseUri().query("batch", "ok").build();
    const response = await this.deps.executor.execute("POST", uri, this.deps.codec.encode(tree));
    await this.deps.interpreter.discard(response);
  }

  remove(doc: object): Promise<WriteResult>;
  remove(id: string, rev: string): Promise<WriteResult>;
  async remove(docOrId: object | string, rev?: string): Promise<WriteResult> {
    let id: string | undefined;
    let revision: string | undefined;
    if (typeof docOrId === "string") {
      id = docOrId;
      revision = rev;
    } else {
      const tree = this.encodeTree(docOrId);
      id = stringMember(tree, "_id");
      revision = stringMember(tree, "_rev");
    }
    assertNotEmpty(id, "id");
    assertNotEmpty(revision, "rev");
    const uri = this.documentUri(id).query("rev", revision).build();
    const response = await this.deps.executor.execute("DELETE", uri);
    return this.deps.interpreter.decodeAs(response, writeResult);
  }

  /**
   * Writes many documents in one request. The result has one entry per
   * input, in input order; rejected items are entries with `ok: false`,
   * not a failed call.
   *
   * @param newEdits false makes the server store the supplied revisions
   *   verbatim (replication-style writes)
   */
  async bulk(docs: readonly object[], newEdits = true): Promise<WriteResult[]> {
    if (docs.length === 0) {
      throw new PreconditionError("docs may not be empty");
    }
    const uri = this.deps.databaseUri().pathSegment("_bulk_docs").build();
    const body = this.deps.codec.encode({ new_edits: newEdits, docs });
    const response = await this.deps.executor.execute("POST", uri, body);
    return this.deps.interpreter.decodeAs(response, writeResults);
  }

  /**
   * Uploads an attachment. Without `docId` a new document is created to
   * hold it, under a generated id.
   */
  async saveAttachment(
    body: RequestBody,
    name: string,
    contentType: string,
    docId?: string,
    docRev?: string
  ): Promise<WriteResult> {
    assertNotEmpty(name, "name");
    assertNotEmpty(contentType, "contentType");
    if (docId !== undefined) {
      assertNotEmpty(docId, "docId");
    }
    const uri = this.documentUri(docId ?? generateId())
      .pathSegment(name)
      .query("rev", docId !== undefined ? docRev : undefined)
      .build();
    const response = await this.deps.executor.execute("PUT", uri, body, contentType);
    return this.deps.interpreter.decodeAs(response, writeResult);
  }

  /**
   * Invokes an update handler, `handlerUri` being "designDoc/handler".
   * Returns the handler's response text.
   */
  async invokeUpdateHandler(handlerUri: string, docId: string, params?: QueryParams): Promise<string> {
    assertNotEmpty(handlerUri, "handlerUri");
    assertNotEmpty(docId, "docId");
    const [designDoc, handler, ...rest] = handlerUri.split("/");
    if (!designDoc || !handler || rest.length > 0) {
      throw new PreconditionError(`handlerUri must be "designDoc/handler", got "${handlerUri}"`);
    }
    const uri = this.deps
      .databaseUri()
      .pathSegment("_design")
      .pathSegment(designDoc)
      .pathSegment("_update")
      .pathSegment(handler)
      .pathSegment(docId)
      .queryParams(params)
      .build();
    const response = await this.deps.executor.execute("PUT", uri);
    return this.deps.interpreter.readText(response);
  }

  /**
   * Serializes through the codec and reads the result back as a JSON
   * object, so id/revision checks see what will actually be sent.
   */
  private encodeTree(doc: object): JsonObject {
    const tree: unknown = this.deps.codec.decode(this.deps.codec.encode(doc));
    if (!isJsonObject(tree)) {
      throw new PreconditionError("document must serialize to a JSON object");
    }
    return tree;
  }
}
