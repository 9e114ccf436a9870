import Database from "better-sqlite3";
import { DuplicateCodeError, hasErrorCode } from "./errors.js";
import { DEFAULT_RECENT_LIMIT, type NewShortLink, type ShortLink, type UrlStore } from "./storage.js";

interface LinkRow {
  id: number;
  long_url: string;
  short_code: string;
  clicks: number;
  expires_at: number | null;
  created_at: number;
}

const COLUMNS = "id, long_url, short_code, clicks, expires_at, created_at";

function toLink(row: LinkRow): ShortLink {
  return {
    id: row.id,
    longUrl: row.long_url,
    shortCode: row.short_code,
    clicks: row.clicks,
    expiresAt: row.expires_at === null ? null : new Date(row.expires_at),
    createdAt: new Date(row.created_at)
  };
}

/**
 * SQLite-backed store. Timestamps are kept as epoch milliseconds so expiry is
 * compared numerically. AUTOINCREMENT keeps ids from being reused after deletes.
 */
export class SqliteUrlStore implements UrlStore {
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
  }

  async init(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS short_links (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        long_url   TEXT    NOT NULL,
        short_code TEXT    NOT NULL UNIQUE,
        clicks     INTEGER NOT NULL DEFAULT 0,
        expires_at INTEGER,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS short_links_expires_at ON short_links (expires_at)
        WHERE expires_at IS NOT NULL;
    `);
  }

  async ping(): Promise<void> {
    this.db.prepare("SELECT 1").get();
  }

  async close(): Promise<void> {
    this.db.close();
  }

  async create(link: NewShortLink): Promise<ShortLink> {
    const stmt = this.db.prepare<[string, string, number | null, number], LinkRow>(
      `INSERT INTO short_links (long_url, short_code, expires_at, created_at)
       VALUES (?, ?, ?, ?)
       RETURNING ${COLUMNS}`
    );
    try {
      const row = stmt.get(link.longUrl, link.shortCode, link.expiresAt?.getTime() ?? null, Date.now());
      if (!row) throw new Error("INSERT returned no row");
      return toLink(row);
    } catch (e) {
      if (hasErrorCode(e, "SQLITE_CONSTRAINT_UNIQUE")) throw new DuplicateCodeError(link.shortCode);
      throw e;
    }
  }

  async getByCode(shortCode: string): Promise<ShortLink | null> {
    const row = this.db
      .prepare<[string], LinkRow>(`SELECT ${COLUMNS} FROM short_links WHERE short_code = ?`)
      .get(shortCode);
    return row ? toLink(row) : null;
  }

  async incrementClicks(shortCode: string): Promise<number | null> {
    const row = this.db
      .prepare<[string], { clicks: number }>(
        "UPDATE short_links SET clicks = clicks + 1 WHERE short_code = ? RETURNING clicks"
      )
      .get(shortCode);
    return row ? row.clicks : null;
  }

  async delete(shortCode: string): Promise<boolean> {
    const res = this.db.prepare<[string]>("DELETE FROM short_links WHERE short_code = ?").run(shortCode);
    return res.changes > 0;
  }

  async listRecent(limit = DEFAULT_RECENT_LIMIT): Promise<ShortLink[]> {
    return this.db
      .prepare<[number], LinkRow>(`SELECT ${COLUMNS} FROM short_links ORDER BY id DESC LIMIT ?`)
      .all(limit)
      .map(toLink);
  }

  async deleteExpired(now: Date): Promise<number> {
    const res = this.db
      .prepare<[number]>("DELETE FROM short_links WHERE expires_at IS NOT NULL AND expires_at <= ?")
      .run(now.getTime());
    return res.changes;
  }
}
