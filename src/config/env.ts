import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

// Unset, non-numeric or non-positive values fall back to the default.
export function positiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const listDir = path.resolve(process.env.LIST_DIR || "data");

export const env = {
  nodeEnv: process.env.NODE_ENV || "development",
  port: positiveNumber(process.env.PORT, 4000),
  corsOrigin: process.env.CORS_ORIGIN || "http://localhost:3000",
  listDir,
  whitelistFile: path.resolve(listDir, process.env.WHITELIST_FILE || "whitelist_urls.txt"),
  blacklistFile: path.resolve(listDir, process.env.BLACKLIST_FILE || "blacklist_urls.txt"),
  dynamicBlacklistFile: path.resolve(listDir, process.env.DYNAMIC_BLACKLIST_FILE || "dynamic_blacklist.txt"),
  whoisTimeoutMs: positiveNumber(process.env.WHOIS_TIMEOUT_MS, 6_000),
  checkRateLimitPerMinute: positiveNumber(process.env.CHECK_RATE_LIMIT_PER_MINUTE, 30)
};
