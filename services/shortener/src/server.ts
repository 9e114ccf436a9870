import { buildApp } from "./app.js";
import { loadConfig, type StorageConfig } from "./config.js";
import type { UrlStore } from "./storage.js";
import { MemoryUrlStore } from "./storage_memory.js";
import { PostgresUrlStore } from "./storage_postgres.js";
import { SqliteUrlStore } from "./storage_sqlite.js";

const config = loadConfig();

function buildStore(storage: StorageConfig): UrlStore {
  switch (storage.mode) {
    case "postgres":
      return new PostgresUrlStore(storage.databaseUrl);
    case "sqlite":
      return new SqliteUrlStore(storage.path);
    case "memory":
      return new MemoryUrlStore();
  }
}

const store = buildStore(config.storage);

const startedAt = new Date().toISOString();
const buildInfo = {
  service: "shortener",
  version: process.env.APP_VERSION ?? "unknown",
  commit: process.env.GIT_SHA ?? "unknown",
  env: process.env.APP_ENV ?? "unknown",
  started_at: startedAt
};

const app = buildApp({
  store,
  config,
  logger: { level: config.logLevel },
  buildInfo
});

await store.init();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: config.port, host: config.host });
app.log.info({ port: config.port, storageMode: config.storage.mode, ...buildInfo }, "shortener started");
