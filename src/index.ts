import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { AppError, ValidationError } from "@/lib/errors";
import type { PasswordHasher } from "@/lib/password";
import type { Persistence } from "@/lib/persistence";
import type { SessionIssuer } from "@/lib/session";
import type { ErrorResponse } from "@/types/api";
import { createAuthRoute } from "./routes/auth";
import { createFoldersRoute } from "./routes/folders";
import healthRoute from "./routes/health";
import { createNotesRoute } from "./routes/notes";

export interface AppDependencies {
  db: Persistence;
  sessions: SessionIssuer;
  passwords: PasswordHasher;
  allowedOrigins?: string[];
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies) {
  const app = new Hono();
  const allowed = deps.allowedOrigins ?? [];

  if (deps.requestLogging) {
    app.use("*", logger());
  }

  app.use(
    "*",
    cors({
      origin: (origin) => {
        if (allowed.includes("*")) return "*";
        return allowed.includes(origin) ? origin : null;
      },
      allowHeaders: ["Content-Type", "Authorization"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      credentials: true,
      maxAge: 86400,
    })
  );

  app.route("/", healthRoute);
  app.route("/", createAuthRoute(deps));
  app.route("/folders", createFoldersRoute(deps));
  app.route("/notes", createNotesRoute(deps));

  app.notFound((c) => {
    const response: ErrorResponse = { error: "Not Found" };
    return c.json(response, 404);
  });

  app.onError((error, c) => {
    if (error instanceof AppError) {
      const response: ErrorResponse = { error: error.message };
      if (error instanceof ValidationError && error.issues.length > 0) {
        response.issues = error.issues;
      }
      return c.json(response, error.status);
    }
    console.error(`[Error] ${c.req.method} ${c.req.path}:`, error);
    const response: ErrorResponse = { error: "Internal Server Error" };
    return c.json(response, 500);
  });

  return app;
}
