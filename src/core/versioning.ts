/**
 * Client versioning
 */

import { CLIENT_VERSION } from "./types.js";

export function getClientVersion(): string {
  return CLIENT_VERSION;
}

export function getUserAgent(): string {
  return `couchwire/${getClientVersion()}`;
}
