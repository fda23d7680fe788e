import { DEFAULT_PASSWORD_HASH_ITERATIONS } from "@/lib/password";
import { DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES } from "@/lib/session";
import type { AppConfig, Env } from "@/types/env";

export const DEV_SECRET_KEY = "dev-only-secret-not-for-prod";

const DEFAULT_PORT = 8000;
const DEFAULT_DATABASE_URL = "file:family-notes.db";
const DEFAULT_ALLOWED_ORIGINS = "http://localhost:3000,http://127.0.0.1:3000";

function parsePositiveInteger(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

function parseOrigins(value: string | undefined): string[] {
  return (value || DEFAULT_ALLOWED_ORIGINS)
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
  let secretKey = env.SECRET_KEY?.trim();
  if (!secretKey) {
    console.warn("[Config] SECRET_KEY is not set; using the development secret");
    secretKey = DEV_SECRET_KEY;
  }

  return {
    port: parsePositiveInteger(env.PORT, DEFAULT_PORT),
    databaseUrl: env.DATABASE_URL?.trim() || DEFAULT_DATABASE_URL,
    databaseAuthToken: env.DATABASE_AUTH_TOKEN?.trim() || undefined,
    secretKey,
    accessTokenExpireMinutes: parsePositiveInteger(
      env.ACCESS_TOKEN_EXPIRE_MINUTES,
      DEFAULT_ACCESS_TOKEN_EXPIRE_MINUTES
    ),
    passwordHashIterations: parsePositiveInteger(
      env.PASSWORD_HASH_ITERATIONS,
      DEFAULT_PASSWORD_HASH_ITERATIONS
    ),
    allowedOrigins: parseOrigins(env.ALLOWED_ORIGINS),
    requestLogging: parseBoolean(env.REQUEST_LOGGING, true),
  };
}
