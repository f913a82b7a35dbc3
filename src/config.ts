import dotenv from "dotenv";
import type { FetchClientOptions } from "./oura/client.js";
import { isValidTimeZone } from "./utils/dates.js";

if (process.env.NODE_ENV === "test") {
  dotenv.config({ path: ".env.test", override: true });
} else if (process.env.NODE_ENV !== "production") {
  dotenv.config({ path: ".env", override: true });
}

const env = process.env.NODE_ENV || "development";

function parseIntegerEnv(name: string, min: number): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < min || String(value) !== raw.trim()) {
    throw new Error(`${name} must be an integer >= ${min}. Received "${raw}".`);
  }
  return value;
}

function parseBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(
    `${name} must be a boolean (true/false). Received "${raw}".`
  );
}

function parseTimeZoneEnv(name: string): string | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  if (!isValidTimeZone(raw)) {
    throw new Error(`${name} must be a valid IANA time zone. Received "${raw}".`);
  }
  return raw;
}

export const config = {
  env,
  oura: {
    accessToken: process.env.OURA_ACCESS_TOKEN || "",
    hostname: process.env.OURA_HOSTNAME || "api.ouraring.com",
    apiVersion: process.env.OURA_API_VERSION || "v2",
    sslVerify: parseBooleanEnv("OURA_SSL_VERIFY", true),
    timeoutMs: parseIntegerEnv("OURA_TIMEOUT_MS", 1),
  },
  debug: parseBooleanEnv("OURA_DEBUG", false),
  timezone: parseTimeZoneEnv("TIMEZONE"),
} as const;

/** Client options built from the environment. Logging goes to `console` when OURA_DEBUG is on. */
export function clientOptionsFromConfig(): FetchClientOptions {
  if (!config.oura.accessToken) {
    throw new Error("OURA_ACCESS_TOKEN is required. Set it in .env or the environment.");
  }
  return {
    accessToken: config.oura.accessToken,
    hostname: config.oura.hostname,
    version: config.oura.apiVersion,
    sslVerify: config.oura.sslVerify,
    timeoutMs: config.oura.timeoutMs,
    timeZone: config.timezone,
    logger: config.debug ? console : undefined,
  };
}
