/**
 * JSON codec used for every request and response body.
 *
 * The client treats the codec as a black box: `encode` must produce UTF-8
 * JSON text, `decode` must throw on malformed input. Anything thrown by
 * `decode` surfaces to callers as a DecodeError.
 */

export interface JsonCodec {
  encode(value: unknown): string;
  decode(text: string): unknown;
}

export const defaultJsonCodec: JsonCodec = {
  encode(value: unknown): string {
    return JSON.stringify(value);
  },
  decode(text: string): unknown {
    return JSON.parse(text) as unknown;
  },
};
