import { DuplicateCodeError } from "./errors.js";
import { DEFAULT_RECENT_LIMIT, type NewShortLink, type ShortLink, type UrlStore } from "./storage.js";

export class MemoryUrlStore implements UrlStore {
  private readonly map = new Map<string, ShortLink>();
  private nextId = 1;

  async init(): Promise<void> {
    // nothing
  }

  async ping(): Promise<void> {
    // nothing
  }

  async close(): Promise<void> {
    this.map.clear();
  }

  async create(link: NewShortLink): Promise<ShortLink> {
    if (this.map.has(link.shortCode)) throw new DuplicateCodeError(link.shortCode);

    const rec: ShortLink = {
      id: this.nextId++,
      longUrl: link.longUrl,
      shortCode: link.shortCode,
      clicks: 0,
      expiresAt: link.expiresAt,
      createdAt: new Date()
    };
    this.map.set(rec.shortCode, rec);
    return { ...rec };
  }

  async getByCode(shortCode: string): Promise<ShortLink | null> {
    const rec = this.map.get(shortCode);
    return rec ? { ...rec } : null;
  }

  async incrementClicks(shortCode: string): Promise<number | null> {
    const rec = this.map.get(shortCode);
    if (!rec) return null;
    rec.clicks += 1;
    return rec.clicks;
  }

  async delete(shortCode: string): Promise<boolean> {
    return this.map.delete(shortCode);
  }

  async listRecent(limit = DEFAULT_RECENT_LIMIT): Promise<ShortLink[]> {
    return [...this.map.values()]
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((rec) => ({ ...rec }));
  }

  async deleteExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [code, rec] of this.map) {
      if (rec.expiresAt !== null && rec.expiresAt.getTime() <= now.getTime()) {
        this.map.delete(code);
        removed++;
      }
    }
    return removed;
  }
}
