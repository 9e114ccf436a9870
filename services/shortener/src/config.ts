export const STORAGE_MODES = ["sqlite", "memory", "postgres"] as const;
export type StorageMode = (typeof STORAGE_MODES)[number];

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type StorageConfig =
  | { mode: "sqlite"; path: string }
  | { mode: "memory" }
  | { mode: "postgres"; databaseUrl: string };

export interface Config {
  port: number;
  host: string;
  /** Overrides the origin derived from each request when building short URLs. */
  baseUrl?: string;
  storage: StorageConfig;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  codeLength: number;
  recentLimit: number;
}

function mustBeUrl(s: string): string {
  try {
    const u = new URL(s);
    if (u.protocol !== "http:" && u.protocol !== "https:") throw new Error("bad protocol");
    return s.replace(/\/+$/, "");
  } catch {
    throw new Error(`Invalid BASE_URL: ${s}`);
  }
}

function oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const found = allowed.find((a) => a === value);
  if (found === undefined) {
    throw new Error(`Invalid ${name}: ${value} (expected one of ${allowed.join(", ")})`);
  }
  return found;
}

function intInRange(name: string, raw: string, min: number, max: number): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return n;
}

function loadStorage(env: NodeJS.ProcessEnv): StorageConfig {
  const databaseUrl = env.DATABASE_URL;
  const mode = env.STORAGE_MODE
    ? oneOf("STORAGE_MODE", env.STORAGE_MODE, STORAGE_MODES)
    : databaseUrl
      ? "postgres"
      : "sqlite";

  switch (mode) {
    case "postgres":
      if (!databaseUrl) throw new Error("STORAGE_MODE=postgres requires DATABASE_URL");
      return { mode, databaseUrl };
    case "sqlite":
      return { mode, path: env.DATABASE_PATH ?? "urls.db" };
    case "memory":
      return { mode };
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = intInRange("PORT", env.PORT ?? "3000", 1, 65535);
  const host = env.HOST ?? "0.0.0.0";
  const baseUrl = env.BASE_URL ? mustBeUrl(env.BASE_URL) : undefined;
  const logLevel = oneOf("LOG_LEVEL", env.LOG_LEVEL ?? "info", LOG_LEVELS);

  const bodyLimitBytes = intInRange("BODY_LIMIT_BYTES", env.BODY_LIMIT_BYTES ?? String(1024 * 16), 1024, 1024 * 1024); // 16KB
  const codeLength = intInRange("CODE_LENGTH", env.CODE_LENGTH ?? "6", 4, 32);
  const recentLimit = intInRange("RECENT_LIMIT", env.RECENT_LIMIT ?? "10", 1, 100);

  return {
    port,
    host,
    baseUrl,
    storage: loadStorage(env),
    logLevel,
    bodyLimitBytes,
    codeLength,
    recentLimit
  };
}
