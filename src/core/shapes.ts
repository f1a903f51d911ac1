/**
 * Runtime shapes for decoded response bodies.
 *
 * A Shape checks an untrusted decoded value and returns it typed, or throws
 * a ShapeError naming the offending path. The interpreter turns ShapeErrors
 * into DecodeErrors.
 */

import type {
  ChangeRevision,
  ChangeRow,
  ChangesResult,
  Document,
  JsonObject,
  Sequence,
  WriteResult,
} from "./types.js";

export type Shape<T> = (value: unknown, path?: string) => T;

export class ShapeError extends Error {
  readonly path: string;

  constructor(path: string, expected: string, actual: unknown) {
    super(`Expected ${expected} at ${path}, got ${describe(actual)}`);
    this.name = "ShapeError";
    this.path = path;
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, path: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ShapeError(path, "object", value);
  }
  return value;
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new ShapeError(path, "string", value);
  }
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined ? undefined : requireString(value, path);
}

function requireSequence(value: unknown, path: string): Sequence {
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  throw new ShapeError(path, "string or number", value);
}

// ============================================================================
// Combinators
// ============================================================================

/**
 * Accepts any decoded JSON value as-is.
 */
export const jsonValue: Shape<unknown> = (value) => value;

export const jsonObject: Shape<JsonObject> = (value, path = "$") =>
  requireObject(value, path);

export function arrayOf<T>(item: Shape<T>): Shape<T[]> {
  return (value, path = "$") => {
    if (!Array.isArray(value)) {
      throw new ShapeError(path, "array", value);
    }
    return value.map((entry: unknown, index) => item(entry, `${path}[${index}]`));
  };
}

// ============================================================================
// Protocol shapes
// ============================================================================

export const document: Shape<Document> = (value, path = "$") => {
  const obj = requireObject(value, path);
  const _id = requireString(obj["_id"], `${path}._id`);
  const _rev = requireString(obj["_rev"], `${path}._rev`);
  return { ...obj, _id, _rev };
};

/**
 * A single write result. A missing `ok` counts as a failure; the server's
 * `error`/`reason` are kept when present.
 */
export const writeResult: Shape<WriteResult> = (value, path = "$") => {
  const obj = requireObject(value, path);
  const result: WriteResult = {
    id: requireString(obj["id"], `${path}.id`),
    ok: obj["ok"] === true,
  };
  const rev = optionalString(obj["rev"], `${path}.rev`);
  if (rev !== undefined) {
    result.rev = rev;
  }
  const error = optionalString(obj["error"], `${path}.error`);
  if (error !== undefined) {
    result.error = error;
  }
  const reason = optionalString(obj["reason"], `${path}.reason`);
  if (reason !== undefined) {
    result.reason = reason;
  }
  return result;
};

export const writeResults: Shape<WriteResult[]> = arrayOf(writeResult);

const changeRevision: Shape<ChangeRevision> = (value, path = "$") => {
  const obj = requireObject(value, path);
  return { rev: requireString(obj["rev"], `${path}.rev`) };
};

export const changeRow: Shape<ChangeRow> = (value, path = "$") => {
  const obj = requireObject(value, path);
  const row: ChangeRow = {
    seq: requireSequence(obj["seq"], `${path}.seq`),
    id: requireString(obj["id"], `${path}.id`),
    changes:
      obj["changes"] === undefined
        ? []
        : arrayOf(changeRevision)(obj["changes"], `${path}.changes`),
  };
  if (obj["deleted"] === true) {
    row.deleted = true;
  }
  if (obj["doc"] !== undefined && obj["doc"] !== null) {
    row.doc = requireObject(obj["doc"], `${path}.doc`);
  }
  return row;
};

export const changesResult: Shape<ChangesResult> = (value, path = "$") => {
  const obj = requireObject(value, path);
  const result: ChangesResult = {
    results: arrayOf(changeRow)(obj["results"], `${path}.results`),
    last_seq: requireSequence(obj["last_seq"], `${path}.last_seq`),
  };
  const pending = obj["pending"];
  if (typeof pending === "number") {
    result.pending = pending;
  }
  return result;
};
