//shardcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Global default from env, falls back to "info"
const GLOBAL_LEVEL: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

// Per-scope defaults (can be overridden by env per scope).
// Shards are chatty at debug (every frame), so they default to info.
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SHARD: "info",
  COLLECTION: "info",
  CACHE: "info",
  PARSER: "info",
  DISPATCH: "info",
  CHUNKER: "info",
  HTTP: "info",
  CLIENT: "info",
  BOT: "debug",
};

// Allow env overrides like LOG_SCOPE_SHARD=debug, LOG_SCOPE_HTTP=warn, etc.
function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) LOG_LEVEL set explicitly beats the table
  const fromGlobal = parseLevel(process.env.LOG_LEVEL);
  if (fromGlobal) return fromGlobal;

  // 3) Default table, then the global fallback
  return PER_SCOPE_DEFAULTS[key] ?? GLOBAL_LEVEL;
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
