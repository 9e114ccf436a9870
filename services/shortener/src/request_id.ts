import type { IncomingHttpHeaders } from "http";
import { randomUUID } from "crypto";

export const REQUEST_ID_HEADER = "x-request-id";
export const MAX_REQUEST_ID_LENGTH = 128;

// Printable ASCII only, so the id is safe to echo into a response header
const PRINTABLE_RE = /^[\x21-\x7e]+$/;

/**
 * Incoming X-Request-Id if it is usable, otherwise a fresh UUID.
 */
export function getOrCreateRequestId(headers: IncomingHttpHeaders): string {
  const raw = headers[REQUEST_ID_HEADER];
  const incoming = Array.isArray(raw) ? raw[0] : raw;

  const trimmed = (incoming ?? "").trim();
  if (trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH && PRINTABLE_RE.test(trimmed)) {
    return trimmed;
  }

  return randomUUID();
}
