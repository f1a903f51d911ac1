/**
 * Incremental line reader over a streamed response body.
 *
 * Lines are split on "\n" (a trailing "\r" is dropped). Nothing is buffered
 * beyond the current partial line, so a never-ending body is fine.
 */

type ReadResult = Awaited<ReturnType<ReadableStreamDefaultReader<Uint8Array>["read"]>>;

export class LineReadTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No data received within ${timeoutMs}ms`);
    this.name = "LineReadTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class LineReader {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly decoder = new TextDecoder("utf-8");
  private buffer = "";
  private ended = false;
  private failed = false;
  private closed = false;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  /**
   * Resolves the next line, or null once the stream has ended.
   *
   * @param timeoutMs Upper bound for each wait on the stream; unbounded when omitted
   * @throws LineReadTimeoutError when the bound elapses with no data
   */
  async readLine(timeoutMs?: number): Promise<string | null> {
    for (;;) {
      const newline = this.buffer.indexOf("\n");
      if (newline >= 0) {
        const line = this.buffer.slice(0, newline);
        this.buffer = this.buffer.slice(newline + 1);
        return line.endsWith("\r") ? line.slice(0, -1) : line;
      }
      if (this.ended || this.closed) {
        if (this.buffer.length === 0) {
          return null;
        }
        const rest = this.buffer;
        this.buffer = "";
        return rest;
      }

      const chunk = await this.readChunk(timeoutMs);
      if (chunk.done) {
        this.ended = true;
        this.buffer += this.decoder.decode();
      } else {
        this.buffer += this.decoder.decode(chunk.value, { stream: true });
      }
    }
  }

  /**
   * Cancels the underlying stream. Only the first call has any effect.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      // An errored stream is already closed; cancelling it would only rethrow.
      if (!this.failed) {
        await this.reader.cancel();
      }
    } catch {
      // The stream errored after the last read; there is nothing left to cancel.
    } finally {
      this.reader.releaseLock();
    }
  }

  private async readChunk(timeoutMs: number | undefined): Promise<ReadResult> {
    try {
      if (timeoutMs === undefined) {
        return await this.reader.read();
      }
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new LineReadTimeoutError(timeoutMs)), timeoutMs);
      });
      try {
        return await Promise.race([this.reader.read(), timeout]);
      } finally {
        clearTimeout(timer);
      }
    } catch (error) {
      if (!(error instanceof LineReadTimeoutError)) {
        this.failed = true;
      }
      throw error;
    }
  }
}
