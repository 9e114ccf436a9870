import type { CreateLinkInput } from "./links.js";

export const MAX_URL_LENGTH = 2048;

/** GET paths the service itself serves; a custom code here would be unreachable. */
export const RESERVED_CODES: ReadonlySet<string> = new Set(["health", "ready", "metrics"]);

const CUSTOM_CODE_RE = /^[A-Za-z0-9_-]{1,64}$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface LinkForm {
  long_url?: string;
  custom_code?: string;
  expiration_date?: string;
}

/** `YYYY-MM-DD` to midnight UTC of that day, or null when it is not a calendar date. */
export function parseExpirationDate(s: string): Date | null {
  const m = DATE_RE.exec(s);
  if (!m) return null;

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d;
}

export function validateLinkForm(form: LinkForm): { ok: true; value: CreateLinkInput } | { ok: false; error: string } {
  const longUrl = (form.long_url ?? "").trim();
  if (longUrl.length === 0) {
    return { ok: false, error: "Please enter a URL to shorten." };
  }
  if (longUrl.length > MAX_URL_LENGTH) {
    return { ok: false, error: `URL must be at most ${MAX_URL_LENGTH} characters.` };
  }

  const customCode = (form.custom_code ?? "").trim();
  if (customCode.length > 0) {
    if (!CUSTOM_CODE_RE.test(customCode)) {
      return { ok: false, error: "Custom code may only contain letters, digits, '-' and '_' (up to 64)." };
    }
    if (RESERVED_CODES.has(customCode)) {
      return { ok: false, error: `Custom code "${customCode}" is reserved.` };
    }
  }

  const rawDate = (form.expiration_date ?? "").trim();
  let expiresAt: Date | null = null;
  if (rawDate.length > 0) {
    expiresAt = parseExpirationDate(rawDate);
    if (!expiresAt) {
      return { ok: false, error: "Expiration date must be a valid YYYY-MM-DD date." };
    }
  }

  return {
    ok: true,
    value: {
      longUrl,
      customCode: customCode.length > 0 ? customCode : undefined,
      expiresAt
    }
  };
}
