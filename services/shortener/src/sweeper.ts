import type { FastifyBaseLogger } from "fastify";
import type { UrlStore } from "./storage.js";
import { shortLinksExpiredTotal } from "./metrics.js";

/**
 * Purges links whose expiration has passed. Runs inline before reads rather
 * than on a timer, so a lookup in the same request never sees an expired link.
 */
export async function sweepExpired(
  store: UrlStore,
  now: Date = new Date(),
  log?: Pick<FastifyBaseLogger, "info">
): Promise<number> {
  const removed = await store.deleteExpired(now);
  if (removed > 0) {
    shortLinksExpiredTotal.inc(removed);
    log?.info({ removed }, "expired links swept");
  }
  return removed;
}
