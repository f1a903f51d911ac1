/**
 * Response interpretation
 * Flow: classify → (drain + map error) | (decode + shape-check) | raw stream
 *
 * INVARIANTS:
 * - A response handed to the interpreter is always released, unless it is
 *   returned as a raw stream, in which case the caller owns it
 * - Error bodies are drained before the error is raised
 * - Decoding failures surface as DecodeError
 */

import type { TransportResponse } from "./types.js";
import type { JsonCodec } from "./codec.js";
import { DecodeError } from "./errors.js";
import { ErrorMapper, type Outcome } from "./error-mapper.js";
import { ShapeError, isJsonObject, type Shape } from "./shapes.js";

export class ResponseInterpreter {
  private readonly codec: JsonCodec;

  constructor(codec: JsonCodec) {
    this.codec = codec;
  }

  /**
   * Classifies the response by status code. For anything but success the
   * body is drained and the response released before returning; a success
   * response is left unread.
   */
  async classify(response: TransportResponse): Promise<Outcome> {
    if (ErrorMapper.isSuccess(response.status)) {
      return { kind: "success", status: response.status };
    }
    let body: string;
    try {
      body = await this.drain(response);
    } finally {
      await this.release(response);
    }
    return ErrorMapper.classify(
      response.status,
      response.statusText,
      body,
      this.serverReason(body)
    );
  }

  /**
   * Throws the mapped CouchError for any non-success response.
   */
  async validate(response: TransportResponse): Promise<void> {
    const outcome = await this.classify(response);
    if (outcome.kind !== "success") {
      throw ErrorMapper.toError(outcome);
    }
  }

  async decodeAs<T>(response: TransportResponse, shape: Shape<T>): Promise<T> {
    await this.validate(response);
    try {
      const text = await this.drain(response);
      return this.decodeText(text, shape);
    } finally {
      await this.release(response);
    }
  }

  /**
   * Decodes already-read text. Exposed for the change feed, which reads
   * its body line by line.
   */
  decodeText<T>(text: string, shape: Shape<T>): T {
    let value: unknown;
    try {
      value = this.codec.decode(text);
    } catch (error) {
      throw new DecodeError(
        `Malformed JSON in response body: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    try {
      return shape(value);
    } catch (error) {
      if (error instanceof ShapeError) {
        throw new DecodeError(`Unexpected response body: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Validates and returns the body as text.
   */
  async readText(response: TransportResponse): Promise<string> {
    await this.validate(response);
    try {
      return await this.drain(response);
    } finally {
      await this.release(response);
    }
  }

  /**
   * Validates and discards the body.
   */
  async discard(response: TransportResponse): Promise<void> {
    await this.validate(response);
    await this.release(response);
  }

  /**
   * Validates and hands out the raw body. The caller owns the stream and
   * must consume or cancel it.
   */
  async asStream(response: TransportResponse): Promise<ReadableStream<Uint8Array>> {
    await this.validate(response);
    if (response.body === null) {
      return new ReadableStream<Uint8Array>({
        start(controller) {
          controller.close();
        },
      });
    }
    return response.body;
  }

  /**
   * Cancels any unread body and aborts the request. Safe to call repeatedly.
   */
  async release(response: TransportResponse): Promise<void> {
    const body = response.body;
    try {
      if (body !== null && !body.locked) {
        await body.cancel();
      }
    } catch {
      // An errored body rejects cancel(); the abort below still frees the connection.
    } finally {
      response.abort();
    }
  }

  /**
   * Reads the whole body as UTF-8 text.
   */
  private async drain(response: TransportResponse): Promise<string> {
    if (response.body === null) {
      return "";
    }
    const reader = response.body.getReader();
    const decoder = new TextDecoder("utf-8");
    let text = "";
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        text += decoder.decode(value, { stream: true });
      }
      text += decoder.decode();
    } catch (error) {
      throw new DecodeError(
        `Failed to read response body (status ${response.status}): ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      reader.releaseLock();
    }
    return text;
  }

  private serverReason(body: string): string | undefined {
    if (body.length === 0) {
      return undefined;
    }
    let parsed: unknown;
    try {
      parsed = this.codec.decode(body);
    } catch {
      // Non-JSON error bodies (proxies, load balancers) keep the status text.
      return undefined;
    }
    const reason = isJsonObject(parsed) ? parsed["reason"] : undefined;
    return typeof reason === "string" ? reason : undefined;
  }
}
