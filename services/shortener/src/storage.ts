export interface ShortLink {
  id: number;
  longUrl: string;
  shortCode: string;
  clicks: number;
  expiresAt: Date | null;
  createdAt: Date;
}

export interface NewShortLink {
  longUrl: string;
  shortCode: string;
  expiresAt: Date | null;
}

export const DEFAULT_RECENT_LIMIT = 10;

/**
 * Persistence for short links. Implementations enforce code uniqueness with the
 * backend's own constraint and reject duplicates with `DuplicateCodeError`.
 */
export interface UrlStore {
  init(): Promise<void>;
  ping(): Promise<void>;
  close(): Promise<void>;
  create(link: NewShortLink): Promise<ShortLink>;
  getByCode(shortCode: string): Promise<ShortLink | null>;
  /** Returns the new click count, or null when no link has this code. */
  incrementClicks(shortCode: string): Promise<number | null>;
  delete(shortCode: string): Promise<boolean>;
  listRecent(limit?: number): Promise<ShortLink[]>;
  /** Removes links whose expiration is at or before `now`; returns how many. */
  deleteExpired(now: Date): Promise<number>;
}
