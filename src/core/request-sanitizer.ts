import type { SanitizerOptions } from "./types.js";
import { redactedKeys } from "./observability-sanitizer.js";

const REDACTED = "[REDACTED]";

function matches(name: string, value: string, redacted: string[]): boolean {
  // Normalize hyphens/underscores so "x-auth-token" matches "token"
  const key = name.toLowerCase().replace(/[-_]/g, "");
  const lowerValue = value.toLowerCase();
  return redacted.some((r) => {
    const normalized = r.replace(/[-_]/g, "");
    return key.includes(normalized) || lowerValue.includes(r);
  });
}

export function sanitizeRequestHeaders(
  headers: Record<string, string>,
  opts?: SanitizerOptions
): Record<string, string> {
  const redacted = redactedKeys(opts);
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    out[name] = matches(name, value, redacted) ? REDACTED : value;
  }
  return out;
}

/**
 * Strips userinfo and redacts sensitive query parameters. Unparseable
 * input is returned as-is.
 */
export function sanitizeUri(uri: string, opts?: SanitizerOptions): string {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return uri;
  }
  const redacted = redactedKeys(opts);
  if (url.username || url.password) {
    url.username = "";
    url.password = "";
  }
  const params = new URLSearchParams();
  let changed = false;
  for (const [name, value] of url.searchParams) {
    if (matches(name, value, redacted)) {
      params.append(name, REDACTED);
      changed = true;
    } else {
      params.append(name, value);
    }
  }
  if (changed) {
    url.search = params.toString();
  }
  return url.toString();
}
