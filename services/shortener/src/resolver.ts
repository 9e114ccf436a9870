import type { FastifyBaseLogger } from "fastify";
import type { ShortLink, UrlStore } from "./storage.js";
import { sweepExpired } from "./sweeper.js";

export const PREVIEW_SUFFIX = "+";

export type Resolution =
  | { kind: "not_found"; shortCode: string }
  | { kind: "preview"; link: ShortLink }
  | { kind: "redirect"; longUrl: string; clicks: number };

export function parseCodePath(raw: string): { shortCode: string; preview: boolean } {
  if (raw.endsWith(PREVIEW_SUFFIX)) {
    return { shortCode: raw.slice(0, -PREVIEW_SUFFIX.length), preview: true };
  }
  return { shortCode: raw, preview: false };
}

export interface ResolveOptions {
  now?: Date;
  log?: Pick<FastifyBaseLogger, "info">;
}

export async function resolveLink(store: UrlStore, raw: string, { now, log }: ResolveOptions = {}): Promise<Resolution> {
  const { shortCode, preview } = parseCodePath(raw);

  await sweepExpired(store, now, log);

  const link = await store.getByCode(shortCode);
  if (!link) return { kind: "not_found", shortCode };
  if (preview) return { kind: "preview", link };

  const clicks = await store.incrementClicks(shortCode);
  // deleted between lookup and increment
  if (clicks === null) return { kind: "not_found", shortCode };

  return { kind: "redirect", longUrl: link.longUrl, clicks };
}
