import { serve } from "@hono/node-server";
import { loadConfig } from "./config";
import { createApp } from "./index";
import { createDatabaseClient, initializeSchema } from "./lib/database";
import { PasswordHasher } from "./lib/password";
import { createPersistence } from "./lib/persistence";
import { SessionIssuer } from "./lib/session";

async function main(): Promise<void> {
  const config = loadConfig();
  const client = createDatabaseClient({
    url: config.databaseUrl,
    authToken: config.databaseAuthToken,
  });
  await initializeSchema(client);
  console.log("[DB] Schema ready");

  const app = createApp({
    db: createPersistence(client),
    sessions: new SessionIssuer({
      secretKey: config.secretKey,
      expireMinutes: config.accessTokenExpireMinutes,
    }),
    passwords: new PasswordHasher(config.passwordHashIterations),
    allowedOrigins: config.allowedOrigins,
    requestLogging: config.requestLogging,
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log("========================================");
    console.log("  Family Notes API Started");
    console.log("========================================");
    console.log(`  Port:         ${info.port}`);
    console.log(`  Health:       http://localhost:${info.port}/health`);
    console.log(`  Database:     ${config.databaseUrl}`);
    console.log(`  Environment:  ${process.env.NODE_ENV || "development"}`);
    console.log("========================================");
  });

  const shutdown = (signal: string) => {
    console.log(`[Shutdown] ${signal} received, closing server...`);
    server.close(() => {
      client.close();
      console.log("[Shutdown] Server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  console.error("[Startup] Failed to start server:", error);
  process.exit(1);
});
