import type { Metric, SanitizerOptions } from "./types.js";

export const DEFAULT_REDACTED_KEYS = [
  "authorization",
  "cookie",
  "token",
  "password",
  "secret",
  "apikey",
  "api_key",
];

export function redactedKeys(opts?: SanitizerOptions): string[] {
  return (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map((key) => key.toLowerCase());
}

export function shouldRedact(key: string, redacted: string[]): boolean {
  const lower = key.toLowerCase();
  return redacted.some((r) => lower.includes(r));
}

/**
 * Deep copy of `obj` with every value under a sensitive key replaced.
 */
export function sanitizeObject(obj: unknown, opts?: SanitizerOptions): unknown {
  const redacted = redactedKeys(opts);

  if (obj === null || typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map((v: unknown) => sanitizeObject(v, opts));
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (shouldRedact(k, redacted)) {
      out[k] = "[REDACTED]";
    } else if (v !== null && typeof v === "object") {
      out[k] = sanitizeObject(v, opts);
    } else {
      out[k] = v;
    }
  }
  return out;
}

export function sanitizeMetric(metric: Metric, opts?: SanitizerOptions): Metric {
  const redacted = redactedKeys(opts);
  const tags: Record<string, string> = {};
  for (const [k, v] of Object.entries(metric.tags)) {
    tags[k] = shouldRedact(k, redacted) || shouldRedact(v, redacted) ? "[REDACTED]" : v;
  }
  return { ...metric, tags };
}
