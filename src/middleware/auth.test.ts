import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { SignJWT } from "jose";
import { UnauthorizedError } from "@/lib/errors";
import { register } from "@/services/accountService";
import {
  createTestContext,
  TEST_SECRET,
  type TestContext,
} from "@/test/testDatabase";
import { authenticateRequest } from "./auth";

describe("authenticateRequest", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
    await register(ctx, { username: "mom", password: "pw", role: "parent" });
    await register(ctx, {
      username: "kid1",
      password: "pw",
      role: "child",
      parentUsername: "mom",
    });
  });

  it("should resolve a token to the stored account", async () => {
    const token = await ctx.sessions.issue("kid1");
    expect(await authenticateRequest(ctx, token)).toEqual({
      kind: "child",
      username: "kid1",
      parentUsername: "mom",
    });
  });

  it("should resolve a parent to the parent variant", async () => {
    const token = await ctx.sessions.issue("mom");
    expect(await authenticateRequest(ctx, token)).toEqual({
      kind: "parent",
      username: "mom",
    });
  });

  it("should reject an invalid token", async () => {
    await expect(authenticateRequest(ctx, "garbage")).rejects.toThrow(
      new UnauthorizedError("Invalid token")
    );
  });

  it("should reject a valid token whose user is gone", async () => {
    const token = await ctx.sessions.issue("ghost");
    await expect(authenticateRequest(ctx, token)).rejects.toThrow(
      new UnauthorizedError("User not found")
    );
  });
});

describe("requireAuth", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext();
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await register(ctx, { username: "mom", password: "pw", role: "parent" });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should require an Authorization header", async () => {
    const res = await ctx.app.request("/notes");
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Authorization token is required" });
  });

  it("should reject a non-bearer scheme", async () => {
    const token = await ctx.sessions.issue("mom");
    const res = await ctx.app.request("/notes", {
      headers: { Authorization: `Basic ${token}` },
    });
    expect(res.status).toBe(401);
  });

  it("should accept a lowercase bearer scheme", async () => {
    const token = await ctx.sessions.issue("mom");
    const res = await ctx.app.request("/folders", {
      headers: { Authorization: `bearer ${token}` },
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);
  });

  it("should reject an expired token", async () => {
    const token = await new SignJWT({})
      .setProtectedHeader({ alg: "HS256" })
      .setSubject("mom")
      .setIssuedAt(Math.floor(Date.now() / 1000) - 7200)
      .setExpirationTime(Math.floor(Date.now() / 1000) - 3600)
      .sign(new TextEncoder().encode(TEST_SECRET));

    const res = await ctx.app.request("/notes", {
      headers: { Authorization: `Bearer ${token}` },
    });
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: "Invalid token" });
  });

  it("should log rejected requests without the token", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    await ctx.app.request("/notes", {
      headers: { Authorization: "Bearer garbage" },
    });
    expect(warn).toHaveBeenCalledWith("[Auth] GET /notes: Invalid token");
  });
});
