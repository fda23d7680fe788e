import type { MiddlewareHandler } from "hono";
import { UnauthorizedError } from "@/lib/errors";
import type { Persistence } from "@/lib/persistence";
import type { SessionIssuer } from "@/lib/session";
import type { AppEnv } from "@/types/app";
import { toAccount, type Account } from "@/types/user";

export interface AccessGuardContext {
  db: Persistence;
  sessions: SessionIssuer;
}

function getBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) return null;
  const [scheme, token, ...rest] = authHeader.trim().split(/\s+/);
  if (scheme?.toLowerCase() !== "bearer" || !token || rest.length > 0) {
    return null;
  }
  return token;
}

/**
 * Resolves a bearer token to the account as it is stored right now. Role and
 * parent link always come from the users table, never from the token.
 */
export async function authenticateRequest(
  ctx: AccessGuardContext,
  token: string
): Promise<Account> {
  const username = await ctx.sessions.resolve(token);
  if (!username) {
    throw new UnauthorizedError("Invalid token");
  }
  const user = await ctx.db.users.findByUsername(username);
  if (!user) {
    throw new UnauthorizedError("User not found");
  }
  return toAccount(user);
}

export function requireAuth(
  ctx: AccessGuardContext
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const token = getBearerToken(c.req.header("Authorization"));
    if (!token) {
      throw new UnauthorizedError("Authorization token is required");
    }

    try {
      c.set("account", await authenticateRequest(ctx, token));
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        console.warn(`[Auth] ${c.req.method} ${c.req.path}: ${error.message}`);
      }
      throw error;
    }
    await next();
  };
}
