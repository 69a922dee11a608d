import pg from "pg";
import type { GatewayConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import { MemoryTokenStore } from "./memoryStore.js";
import { PgTokenStore } from "./pgStore.js";
import type { TokenStore } from "./types.js";

export type { TokenStore } from "./types.js";
export { MemoryTokenStore } from "./memoryStore.js";
export { PgTokenStore } from "./pgStore.js";

/** Postgres when a database url is configured, the in-process store otherwise. */
export async function createTokenStore(config: Pick<GatewayConfig, "databaseUrl" | "historyLimit">): Promise<TokenStore> {
  if (!config.databaseUrl) return new MemoryTokenStore({ historyLimit: config.historyLimit });
  const pool = new pg.Pool({ connectionString: config.databaseUrl });
  const store = new PgTokenStore(pool, { historyLimit: config.historyLimit });
  try {
    await store.migrate();
  } catch (err) {
    await pool.end();
    throw err;
  }
  return store;
}

export type ExpiryPurge = { sweep: () => Promise<number>; stop: () => void };

/** Runs `purgeExpired` every `intervalMs` on a timer that does not hold the process open. */
export function scheduleExpiryPurge(store: TokenStore, intervalMs: number, logger: Logger): ExpiryPurge {
  async function sweep(): Promise<number> {
    try {
      const removed = await store.purgeExpired();
      if (removed > 0) logger.info({ event: "store.purge", removed }, "expired tokens purged");
      return removed;
    } catch (err) {
      logger.error({ event: "store.purge.failed", err: err instanceof Error ? err.message : String(err) }, "token purge failed");
      return 0;
    }
  }

  const timer = setInterval(() => {
    void sweep();
  }, intervalMs);
  timer.unref();
  return { sweep, stop: () => clearInterval(timer) };
}
