/**
 * Immutable URI builder.
 *
 * Every call returns a new builder, so a partially built URI (e.g. the
 * database URI) can be shared and extended without copies leaking state.
 */

import type { QueryParams, QueryValue } from "./types.js";

export class UriBuilder {
  private readonly origin: string;
  private readonly segments: readonly string[];
  private readonly params: ReadonlyArray<readonly [string, string]>;

  private constructor(
    origin: string,
    segments: readonly string[],
    params: ReadonlyArray<readonly [string, string]>
  ) {
    this.origin = origin;
    this.segments = segments;
    this.params = params;
  }

  /**
   * Starts a builder at `protocol://host:port`.
   */
  static from(protocol: string, host: string, port: number): UriBuilder {
    const origin = new URL(`${protocol}://${host}:${port}`).origin;
    return new UriBuilder(origin, [], []);
  }

  /**
   * Appends one path segment, escaped.
   */
  pathSegment(segment: string): UriBuilder {
    return new UriBuilder(
      this.origin,
      [...this.segments, encodeURIComponent(segment)],
      this.params
    );
  }

  /**
   * Appends a path that may contain "/" separators; each part is escaped
   * on its own and empty parts are dropped.
   */
  path(path: string): UriBuilder {
    let builder: UriBuilder = this;
    for (const part of path.split("/")) {
      if (part.length > 0) {
        builder = builder.pathSegment(part);
      }
    }
    return builder;
  }

  /**
   * Adds a query parameter. Undefined values are skipped.
   */
  query(name: string, value: QueryValue | undefined): UriBuilder {
    if (value === undefined) {
      return this;
    }
    return new UriBuilder(this.origin, this.segments, [
      ...this.params,
      [name, String(value)],
    ]);
  }

  queryParams(params: QueryParams | undefined): UriBuilder {
    let builder: UriBuilder = this;
    for (const [name, value] of Object.entries(params ?? {})) {
      builder = builder.query(name, value);
    }
    return builder;
  }

  build(): string {
    const search = new URLSearchParams();
    for (const [name, value] of this.params) {
      search.append(name, value);
    }
    const query = search.toString();
    const base = `${this.origin}/${this.segments.join("/")}`;
    return query.length > 0 ? `${base}?${query}` : base;
  }
}
