import { Hono } from "hono";
import type { SessionIssuer } from "@/lib/session";
import { loginSchema, signupSchema } from "@/lib/schemas";
import {
  authenticate,
  register,
  type AccountServiceContext,
} from "@/services/accountService";
import type { LoginResponse, SignupResponse } from "@/types/api";
import { parseJsonBody } from "@/utils/body";

export interface AuthRouteContext extends AccountServiceContext {
  sessions: SessionIssuer;
}

export function createAuthRoute(ctx: AuthRouteContext) {
  const route = new Hono();

  route.post("/signup", async (c) => {
    const body = await parseJsonBody(c, signupSchema);
    await register(ctx, {
      username: body.username,
      password: body.password,
      role: body.role,
      parentUsername: body.parent_username,
    });
    const response: SignupResponse = { message: "user created" };
    return c.json(response, 201);
  });

  route.post("/login", async (c) => {
    const body = await parseJsonBody(c, loginSchema);
    const user = await authenticate(ctx, body.username, body.password);
    const token = await ctx.sessions.issue(user.username);
    const response: LoginResponse = {
      token,
      access_token: token,
      token_type: "bearer",
      role: user.role,
    };
    return c.json(response);
  });

  return route;
}
