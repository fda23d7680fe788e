import { describe, it, expect, vi, afterEach } from "vitest";
import { DEV_SECRET_KEY, loadConfig } from "./config";

describe("loadConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should apply defaults for an empty environment", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(loadConfig({})).toEqual({
      port: 8000,
      databaseUrl: "file:family-notes.db",
      databaseAuthToken: undefined,
      secretKey: DEV_SECRET_KEY,
      accessTokenExpireMinutes: 10080,
      passwordHashIterations: 210000,
      allowedOrigins: ["http://localhost:3000", "http://127.0.0.1:3000"],
      requestLogging: true,
    });
  });

  it("should warn when the development secret is used", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    loadConfig({});
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should read values from the environment", () => {
    const config = loadConfig({
      PORT: "9000",
      DATABASE_URL: "libsql://notes.example.com",
      DATABASE_AUTH_TOKEN: "test-token",
      SECRET_KEY: "test-secret",
      ACCESS_TOKEN_EXPIRE_MINUTES: "60",
      PASSWORD_HASH_ITERATIONS: "5000",
      ALLOWED_ORIGINS: " https://a.example.com , https://b.example.com ,",
      REQUEST_LOGGING: "false",
    });

    expect(config).toEqual({
      port: 9000,
      databaseUrl: "libsql://notes.example.com",
      databaseAuthToken: "test-token",
      secretKey: "test-secret",
      accessTokenExpireMinutes: 60,
      passwordHashIterations: 5000,
      allowedOrigins: ["https://a.example.com", "https://b.example.com"],
      requestLogging: false,
    });
  });

  it("should fall back to defaults for invalid numbers", () => {
    const config = loadConfig({
      SECRET_KEY: "test-secret",
      PORT: "abc",
      ACCESS_TOKEN_EXPIRE_MINUTES: "-5",
      PASSWORD_HASH_ITERATIONS: "1.5",
    });

    expect(config.port).toBe(8000);
    expect(config.accessTokenExpireMinutes).toBe(10080);
    expect(config.passwordHashIterations).toBe(210000);
  });
});
