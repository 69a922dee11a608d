export type Env = Record<string, string | undefined>;

export type GatewayConfig = {
  databaseUrl: string | null;
  tokenTtlSeconds: number;
  chunkSize: number;
  outputChunkSize: number;
  historyLimit: number;
  purgeIntervalSeconds: number;
  port: number;
  host: string;
  baseUrl: string;
};

export const MIN_CHUNK_SIZE = 256 * 1024;
export const MAX_CHUNK_SIZE = 1024 * 1024;

function intEnv(env: Env, name: string, fallback: number, min: number): number {
  const raw = String(env[name] ?? "").trim();
  if (!raw) return fallback;
  const n = Math.floor(Number(raw));
  if (!Number.isFinite(n)) throw new Error(`${name} must be a number, got "${raw}"`);
  return Math.max(min, n);
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const chunkSize = intEnv(env, "CHUNK_SIZE", 512 * 1024, 1);
  if (chunkSize < MIN_CHUNK_SIZE || chunkSize > MAX_CHUNK_SIZE) {
    throw new Error(`CHUNK_SIZE must be between ${MIN_CHUNK_SIZE} and ${MAX_CHUNK_SIZE}`);
  }
  const port = intEnv(env, "PORT", 8000, 0);
  const host = String(env.HOST || "0.0.0.0").trim();
  return {
    databaseUrl: String(env.DATABASE_URL || "").trim() || null,
    tokenTtlSeconds: intEnv(env, "TOKEN_TTL_SECONDS", 86_400, 0),
    chunkSize,
    outputChunkSize: intEnv(env, "OUTPUT_CHUNK_SIZE", 64 * 1024, 1),
    historyLimit: intEnv(env, "HISTORY_LIMIT", 200, 1),
    purgeIntervalSeconds: intEnv(env, "PURGE_INTERVAL_SECONDS", 300, 1),
    port,
    host,
    baseUrl: (String(env.BASE_URL || "").trim() || `http://127.0.0.1:${port}`).replace(/\/$/, "")
  };
}
