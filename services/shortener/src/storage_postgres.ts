import pg from "pg";
import { DuplicateCodeError, hasErrorCode } from "./errors.js";
import { DEFAULT_RECENT_LIMIT, type NewShortLink, type ShortLink, type UrlStore } from "./storage.js";

const { Pool } = pg;

// 23505 = unique_violation
const UNIQUE_VIOLATION = "23505";

interface LinkRow {
  id: number;
  long_url: string;
  short_code: string;
  clicks: number;
  expires_at: Date | null;
  created_at: Date;
}

const COLUMNS = "id, long_url, short_code, clicks, expires_at, created_at";

function toLink(row: LinkRow): ShortLink {
  return {
    id: row.id,
    longUrl: row.long_url,
    shortCode: row.short_code,
    clicks: row.clicks,
    expiresAt: row.expires_at,
    createdAt: row.created_at
  };
}

export class PostgresUrlStore implements UrlStore {
  private readonly pool: pg.Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({
      connectionString: databaseUrl,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000
    });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS short_links (
        id INTEGER GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
        long_url TEXT NOT NULL,
        short_code TEXT NOT NULL UNIQUE,
        clicks INTEGER NOT NULL DEFAULT 0,
        expires_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async create(link: NewShortLink): Promise<ShortLink> {
    try {
      const res = await this.pool.query<LinkRow>(
        `INSERT INTO short_links (long_url, short_code, expires_at) VALUES ($1, $2, $3)
         RETURNING ${COLUMNS}`,
        [link.longUrl, link.shortCode, link.expiresAt]
      );
      return toLink(res.rows[0]);
    } catch (e) {
      if (hasErrorCode(e, UNIQUE_VIOLATION)) throw new DuplicateCodeError(link.shortCode);
      throw e;
    }
  }

  async getByCode(shortCode: string): Promise<ShortLink | null> {
    const res = await this.pool.query<LinkRow>(`SELECT ${COLUMNS} FROM short_links WHERE short_code = $1`, [
      shortCode
    ]);
    const row = res.rows[0];
    return row ? toLink(row) : null;
  }

  async incrementClicks(shortCode: string): Promise<number | null> {
    const res = await this.pool.query<{ clicks: number }>(
      "UPDATE short_links SET clicks = clicks + 1 WHERE short_code = $1 RETURNING clicks",
      [shortCode]
    );
    const row = res.rows[0];
    return row ? row.clicks : null;
  }

  async delete(shortCode: string): Promise<boolean> {
    const res = await this.pool.query("DELETE FROM short_links WHERE short_code = $1", [shortCode]);
    return (res.rowCount ?? 0) > 0;
  }

  async listRecent(limit = DEFAULT_RECENT_LIMIT): Promise<ShortLink[]> {
    const res = await this.pool.query<LinkRow>(`SELECT ${COLUMNS} FROM short_links ORDER BY id DESC LIMIT $1`, [
      limit
    ]);
    return res.rows.map(toLink);
  }

  async deleteExpired(now: Date): Promise<number> {
    const res = await this.pool.query(
      "DELETE FROM short_links WHERE expires_at IS NOT NULL AND expires_at <= $1",
      [now]
    );
    return res.rowCount ?? 0;
  }
}
